/**
 * Common utility functions shared across the project
 */

import { Rgba } from '../types';

// Re-export logger utilities
export * from './logger';

/**
 * Build an RGBA color; alpha defaults to opaque
 */
export function rgba(r: number, g: number, b: number, a = 255): Rgba {
  return { r, g, b, a };
}

/**
 * Format a color for canvas fillStyle / SVG fill, e.g. rgba(215,189,69,1)
 */
export function toCssColor(color: Rgba): string {
  const alpha = Math.round((clampChannel(color.a) / 255) * 1000) / 1000;
  return `rgba(${clampChannel(color.r)},${clampChannel(color.g)},${clampChannel(color.b)},${alpha})`;
}

function clampChannel(value: number): number {
  return Math.max(0, Math.min(255, Math.round(value)));
}

/**
 * Clamp a number into [min, max]
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Recursively freeze a configuration object
 */
export function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const key of Object.keys(value)) {
    const child: unknown = Reflect.get(value, key);
    if (child !== null && typeof child === 'object' && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
