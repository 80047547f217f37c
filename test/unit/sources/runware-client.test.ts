import axios from 'axios';
import {
  createRunwareClient,
  DEFAULT_MODEL,
  RunwareClient,
} from '../../../src/sources/runware-client';
import { loadConfig } from '../../../src/config';
import { ErrorType, PinComposerError } from '../../../src/types';
import { captureError } from '../../fixtures/errors';

jest.mock('axios');

const mockedAxios = jest.mocked(axios);

const BASE_URL = 'https://runware.test/v1';
const IMAGE_URL = 'https://im.runware.test/image/ws/a1b2.jpg';
// task accepted without an image yet
const PENDING_TASK = { status: 200, data: { data: [{ taskUUID: 'pending' }] } };

describe('RunwareClient', () => {
  const photo = Buffer.from('generated-image-bytes');
  let fetchImage: jest.Mock;
  let sleep: jest.Mock;

  const createClient = (maxPolls = 30): RunwareClient =>
    new RunwareClient({ apiKey: 'test-key', baseUrl: `${BASE_URL}/`, maxPolls, fetchImage, sleep });

  beforeEach(() => {
    fetchImage = jest.fn().mockResolvedValue(photo);
    sleep = jest.fn().mockResolvedValue(undefined);
  });

  describe('generateImage', () => {
    it('should submit an inference task and download the immediate result', async () => {
      mockedAxios.post.mockResolvedValueOnce({ status: 200, data: { data: [{ imageURL: IMAGE_URL }] } });

      const bytes = await createClient().generateImage('  a bowl of ramen  ');

      expect(bytes).toBe(photo);
      expect(fetchImage).toHaveBeenCalledWith(IMAGE_URL);
      expect(mockedAxios.get).not.toHaveBeenCalled();

      const [url, payload, config] = mockedAxios.post.mock.calls[0];
      expect(url).toBe(`${BASE_URL}/tasks`);
      expect(payload).toEqual([
        expect.objectContaining({
          taskType: 'imageInference',
          positivePrompt: 'a bowl of ramen',
          negativePrompt: 'low quality, bad anatomy, distorted, blurry',
          width: 1024,
          height: 1024,
          model: DEFAULT_MODEL,
          steps: 35,
          CFGScale: 7,
          outputType: ['URL'],
          outputFormat: 'JPEG',
          numberResults: 1,
        }),
      ]);
      expect(config).toMatchObject({
        headers: { Authorization: 'Bearer test-key', 'Content-Type': 'application/json' },
        timeout: 30000,
      });
    });

    it('should pass size and model options through', async () => {
      mockedAxios.post.mockResolvedValueOnce({ status: 200, data: { data: [{ imageURL: IMAGE_URL }] } });

      await createClient().generateImage('lighthouse', { width: 832, height: 1216, model: 'runware:100@1' });

      const payload = mockedAxios.post.mock.calls[0][1];
      expect(payload).toEqual([expect.objectContaining({ width: 832, height: 1216, model: 'runware:100@1' })]);
    });

    it('should poll the task until it completes', async () => {
      mockedAxios.post.mockResolvedValueOnce(PENDING_TASK);
      mockedAxios.get
        .mockResolvedValueOnce({ status: 200, data: { data: { status: 'processing' } } })
        .mockResolvedValueOnce({ status: 200, data: { data: { status: 'completed', output: { images: [{ url: IMAGE_URL }] } } } });

      const bytes = await createClient().generateImage('mountain lake');

      expect(bytes).toBe(photo);
      expect(fetchImage).toHaveBeenCalledWith(IMAGE_URL);
      expect(sleep).toHaveBeenCalledTimes(2);
      expect(sleep).toHaveBeenCalledWith(2000);

      const payload = mockedAxios.post.mock.calls[0][1];
      expect(payload).toEqual([expect.objectContaining({ taskUUID: expect.any(String) })]);
      expect(mockedAxios.get.mock.calls[0][0]).toMatch(/^https:\/\/runware\.test\/v1\/tasks\/[0-9a-f-]{36}$/);
    });

    it('should keep polling through failed status requests', async () => {
      mockedAxios.post.mockResolvedValueOnce(PENDING_TASK);
      mockedAxios.get
        .mockRejectedValueOnce(new Error('ECONNRESET'))
        .mockResolvedValueOnce({ status: 502, data: {} })
        .mockResolvedValueOnce({ status: 200, data: { data: [{ status: 'completed', imageURL: IMAGE_URL }] } });

      await expect(createClient().generateImage('city at night')).resolves.toBe(photo);
      expect(mockedAxios.get).toHaveBeenCalledTimes(3);
    });

    it('should fail when the task reports failure', async () => {
      mockedAxios.post.mockResolvedValueOnce(PENDING_TASK);
      mockedAxios.get.mockResolvedValueOnce({ status: 200, data: { data: { status: 'failed', error: 'content rejected' } } });

      await expect(createClient().generateImage('desert')).rejects.toMatchObject({
        type: ErrorType.GENERATION_ERROR,
        message: 'Runware task failed: content rejected',
      });
      expect(fetchImage).not.toHaveBeenCalled();
    });

    it('should give up after the configured number of polls', async () => {
      mockedAxios.post.mockResolvedValueOnce(PENDING_TASK);
      const processing = { status: 200, data: { data: { status: 'processing' } } };
      mockedAxios.get
        .mockResolvedValueOnce(processing)
        .mockResolvedValueOnce(processing)
        .mockResolvedValueOnce(processing);

      const error = await createClient(3)
        .generateImage('forest')
        .catch((reason: unknown) => reason);

      expect(error).toBeInstanceOf(PinComposerError);
      expect(error).toMatchObject({ type: ErrorType.GENERATION_ERROR });
      expect(error).toMatchObject({ message: expect.stringMatching(/did not complete after 3 polls$/) });
      expect(mockedAxios.get).toHaveBeenCalledTimes(3);
      expect(sleep).toHaveBeenCalledTimes(3);
    });

    it('should fail at once when a completed task has no image URL', async () => {
      mockedAxios.post.mockResolvedValueOnce(PENDING_TASK);
      mockedAxios.get.mockResolvedValueOnce({ status: 200, data: { data: { status: 'completed' } } });

      const error = await createClient()
        .generateImage('harbour')
        .catch((reason: unknown) => reason);

      expect(error).toMatchObject({ type: ErrorType.GENERATION_ERROR });
      expect(error).toMatchObject({ message: expect.stringMatching(/completed without an image URL$/) });
      expect(mockedAxios.get).toHaveBeenCalledTimes(1);
      expect(sleep).toHaveBeenCalledTimes(1);
      expect(fetchImage).not.toHaveBeenCalled();
    });

    it.each([
      ['no data field', {}],
      ['an empty data list', { data: [] }],
    ])('should fail without polling when task creation returns %s', async (_name, body) => {
      mockedAxios.post.mockResolvedValueOnce({ status: 200, data: body });

      await expect(createClient().generateImage('harbour')).rejects.toMatchObject({
        type: ErrorType.GENERATION_ERROR,
        message: 'Runware response did not contain any task data',
      });
      expect(mockedAxios.get).not.toHaveBeenCalled();
      expect(sleep).not.toHaveBeenCalled();
    });

    it('should report a rejected API key', async () => {
      mockedAxios.post.mockResolvedValueOnce({ status: 401, data: {} });

      await expect(createClient().generateImage('beach')).rejects.toMatchObject({
        type: ErrorType.GENERATION_ERROR,
        message: 'Runware rejected the API key (HTTP 401)',
      });
    });

    it('should report API errors from task creation', async () => {
      mockedAxios.post.mockResolvedValueOnce({
        status: 400,
        data: { errors: [{ code: 'invalidModel', message: 'Model not found' }] },
      });

      await expect(createClient().generateImage('beach')).rejects.toMatchObject({
        type: ErrorType.GENERATION_ERROR,
        message: 'Runware task creation failed (HTTP 400): invalidModel: Model not found',
      });
    });

    it('should wrap download failures', async () => {
      const fetchError = new PinComposerError(ErrorType.FETCH_ERROR, 'Failed to fetch image');
      fetchImage.mockRejectedValueOnce(fetchError);
      mockedAxios.post.mockResolvedValueOnce({ status: 200, data: { data: [{ imageURL: IMAGE_URL }] } });

      await expect(createClient().generateImage('beach')).rejects.toMatchObject({
        type: ErrorType.GENERATION_ERROR,
        message: 'Image generation failed: Failed to fetch image',
        details: fetchError,
      });
    });

    it('should reject an empty prompt without calling the API', async () => {
      await expect(createClient().generateImage('   ')).rejects.toMatchObject({
        type: ErrorType.GENERATION_ERROR,
        message: 'Image generation failed: Image prompt must not be empty',
      });
      expect(mockedAxios.post).not.toHaveBeenCalled();
    });
  });

  describe('construction', () => {
    it('should require an API key', () => {
      expect(captureError(() => new RunwareClient({ apiKey: '', baseUrl: BASE_URL }))).toMatchObject({
        type: ErrorType.GENERATION_ERROR,
      });
    });

    it('should build a client from configuration', () => {
      expect(createRunwareClient(loadConfig({ RUNWARE_API_KEY: 'test-key' }))).toBeInstanceOf(RunwareClient);
    });

    it('should refuse to build a client without a configured key', () => {
      expect(captureError(() => createRunwareClient(loadConfig({})))).toMatchObject({
        type: ErrorType.GENERATION_ERROR,
        message: 'RUNWARE_API_KEY is not set; image generation is unavailable',
      });
    });
  });
});
