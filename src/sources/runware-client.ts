/**
 * Runware text-to-image client
 */

import axios, { AxiosResponse } from 'axios';
import { randomUUID } from 'crypto';
import { ErrorType, PinComposerError } from '../types';
import { ComposerConfig, getConfig } from '../config';
import { logger, logSourceError } from '../utils/logger';
import {
  GENERATION_MAX_POLLS,
  GENERATION_POLL_INTERVAL,
  GENERATION_POLL_TIMEOUT,
  GENERATION_REQUEST_TIMEOUT,
} from '../constants/security';
import { fetchImageBytes, ImageFetcher } from './image-fetcher';

export const DEFAULT_MODEL = 'rundiffusion:130@100';
export const DEFAULT_NEGATIVE_PROMPT = 'low quality, bad anatomy, distorted, blurry';

export interface GenerateImageOptions {
  width?: number;
  height?: number;
  model?: string;
  negativePrompt?: string;
  steps?: number;
  cfgScale?: number;
}

export interface RunwareClientOptions {
  apiKey: string;
  baseUrl: string;
  maxPolls?: number;
  pollInterval?: number;
  /** Downloads the generated image; defaults to fetchImageBytes */
  fetchImage?: ImageFetcher;
  sleep?: (ms: number) => Promise<void>;
}

interface RunwareTask {
  taskUUID?: string;
  imageURL?: string;
  status?: string;
  error?: string;
  output?: { images?: Array<{ url?: string }> };
}

interface RunwareResponse {
  data?: RunwareTask[] | RunwareTask;
  errors?: Array<{ code?: string; message?: string }>;
}

const delay = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export class RunwareClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly maxPolls: number;
  private readonly pollInterval: number;
  private readonly fetchImage: ImageFetcher;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: RunwareClientOptions) {
    if (!options.apiKey) {
      throw new PinComposerError(ErrorType.GENERATION_ERROR, 'Runware API key is required');
    }
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.maxPolls = options.maxPolls ?? GENERATION_MAX_POLLS;
    this.pollInterval = options.pollInterval ?? GENERATION_POLL_INTERVAL;
    this.fetchImage = options.fetchImage ?? fetchImageBytes;
    this.sleep = options.sleep ?? delay;
  }

  /**
   * Generate one image for `prompt` and return its encoded bytes
   */
  async generateImage(prompt: string, options: GenerateImageOptions = {}): Promise<Buffer> {
    try {
      if (!prompt.trim()) {
        throw new PinComposerError(ErrorType.VALIDATION_ERROR, 'Image prompt must not be empty');
      }

      const taskUUID = randomUUID();
      const imageUrl = await this.createTask(taskUUID, prompt.trim(), options);
      logger.debug('Runware image ready', { operation: 'image-generate', url: imageUrl });
      return await this.fetchImage(imageUrl);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      logSourceError('image-generate', cause);
      if (error instanceof PinComposerError && error.type === ErrorType.GENERATION_ERROR) {
        throw error;
      }
      throw new PinComposerError(
        ErrorType.GENERATION_ERROR,
        `Image generation failed: ${cause.message}`,
        error
      );
    }
  }

  private get headers(): Record<string, string> {
    return {
      'Content-Type': 'application/json',
      Authorization: `Bearer ${this.apiKey}`,
    };
  }

  /**
   * Submit the inference task; returns the image URL, polling when it is not in the first response
   */
  private async createTask(taskUUID: string, prompt: string, options: GenerateImageOptions): Promise<string> {
    const payload = [
      {
        taskType: 'imageInference',
        taskUUID,
        positivePrompt: prompt,
        negativePrompt: options.negativePrompt ?? DEFAULT_NEGATIVE_PROMPT,
        height: options.height ?? 1024,
        width: options.width ?? 1024,
        model: options.model ?? DEFAULT_MODEL,
        steps: options.steps ?? 35,
        CFGScale: options.cfgScale ?? 7,
        outputType: ['URL'],
        outputFormat: 'JPEG',
        numberResults: 1,
        includeCost: true,
      },
    ];

    const response = await axios.post<RunwareResponse>(`${this.baseUrl}/tasks`, payload, {
      headers: this.headers,
      timeout: GENERATION_REQUEST_TIMEOUT,
      validateStatus: () => true,
    });

    if (response.status === 401 || response.status === 403) {
      throw new PinComposerError(
        ErrorType.GENERATION_ERROR,
        `Runware rejected the API key (HTTP ${response.status})`
      );
    }
    if (response.status !== 200) {
      throw new PinComposerError(
        ErrorType.GENERATION_ERROR,
        `Runware task creation failed (HTTP ${response.status}): ${describeErrors(response)}`
      );
    }

    const task = firstTask(response.data);
    if (!task) {
      throw new PinComposerError(ErrorType.GENERATION_ERROR, 'Runware response did not contain any task data');
    }
    if (task.imageURL) {
      return task.imageURL;
    }
    return this.pollForCompletion(taskUUID);
  }

  private async pollForCompletion(taskUUID: string): Promise<string> {
    for (let attempt = 1; attempt <= this.maxPolls; attempt++) {
      await this.sleep(this.pollInterval);

      let response: AxiosResponse<RunwareResponse>;
      try {
        response = await axios.get<RunwareResponse>(`${this.baseUrl}/tasks/${taskUUID}`, {
          headers: this.headers,
          timeout: GENERATION_POLL_TIMEOUT,
          validateStatus: () => true,
        });
      } catch (error) {
        logger.debug('Runware poll request failed', {
          operation: 'image-generate',
          metadata: { attempt, reason: error instanceof Error ? error.message : String(error) },
        });
        continue;
      }

      if (response.status !== 200) {
        logger.debug('Runware poll returned non-200', {
          operation: 'image-generate',
          metadata: { attempt, status: response.status },
        });
        continue;
      }

      const task = firstTask(response.data);
      if (task?.status === 'completed') {
        const url = task.imageURL ?? task.output?.images?.[0]?.url;
        if (!url) {
          throw new PinComposerError(ErrorType.GENERATION_ERROR, `Runware task ${taskUUID} completed without an image URL`);
        }
        return url;
      } else if (task?.status === 'failed') {
        throw new PinComposerError(
          ErrorType.GENERATION_ERROR,
          `Runware task failed: ${task.error ?? 'unknown error'}`
        );
      }
    }

    throw new PinComposerError(
      ErrorType.GENERATION_ERROR,
      `Runware task ${taskUUID} did not complete after ${this.maxPolls} polls`
    );
  }
}

function firstTask(body: RunwareResponse | undefined): RunwareTask | undefined {
  const data = body?.data;
  return Array.isArray(data) ? data[0] : data;
}

function describeErrors(response: AxiosResponse<RunwareResponse>): string {
  const errors = response.data?.errors;
  if (!Array.isArray(errors) || errors.length === 0) {
    return 'unknown error';
  }
  return errors.map((entry) => `${entry.code ?? 'error'}: ${entry.message ?? ''}`.trim()).join('; ');
}

/**
 * Client configured from the environment; fails when no API key is set
 */
export function createRunwareClient(config: Readonly<ComposerConfig> = getConfig()): RunwareClient {
  if (!config.runwareApiKey) {
    throw new PinComposerError(
      ErrorType.GENERATION_ERROR,
      'RUNWARE_API_KEY is not set; image generation is unavailable'
    );
  }
  return new RunwareClient({ apiKey: config.runwareApiKey, baseUrl: config.runwareBaseUrl });
}
