/**
 * Sampling interval adjustments issued from the dashboard.
 *
 * @module dashboard/interval-control
 */

import { clampSamplingInterval } from '../session/sampling-interval.js';
import { formatInterval } from './utils/formatters.js';

/**
 * Direction of an interval step: `faster` halves, `slower` doubles.
 */
export type IntervalStep = 'faster' | 'slower';

/**
 * Returns the interval to request after one step from `currentMs`, clamped to
 * the range the server accepts.
 *
 * @example
 * stepSamplingInterval(1000, 'faster')  // 500
 * stepSamplingInterval(150, 'faster')   // 100
 * stepSamplingInterval(8000, 'slower')  // 10000
 */
export function stepSamplingInterval(currentMs: number, step: IntervalStep): number {
  const next = step === 'faster' ? currentMs / 2 : currentMs * 2;
  return clampSamplingInterval(next);
}

const INTERVAL_RESPONSE = /^Sampling rate set to (\d+)ms$/;

/**
 * Extracts the interval from a successful `set_sampling_rate` response
 * message, or null when the message has another form.
 *
 * @example
 * parseIntervalFromResponse('Sampling rate set to 250ms')  // 250
 */
export function parseIntervalFromResponse(message: string): number | null {
  const match = INTERVAL_RESPONSE.exec(message);
  return match?.[1] !== undefined ? parseInt(match[1], 10) : null;
}

/**
 * Formats the interval for the status bar, marking a value the server has
 * not confirmed yet.
 *
 * @example
 * formatIntervalStatus(500, true)    // "500ms"
 * formatIntervalStatus(1000, false)  // "1s (assumed)"
 */
export function formatIntervalStatus(ms: number, confirmed: boolean): string {
  const text = formatInterval(ms);
  return confirmed ? text : `${text} (assumed)`;
}
