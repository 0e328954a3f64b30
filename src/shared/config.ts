import { runtimeEnv } from './logger';

/** Per-frame interval of stop-motion capture; preview shows each photo this long. */
export const STOP_MOTION_FRAME_INTERVAL_MS = 300;

export interface PreviewConfig {
  stopMotionFrameIntervalMs: number;
  /** Unset disables the watchdog that skips a clip whose end never arrives. */
  decoderStallTimeoutMs?: number;
}

export class PreviewConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PreviewConfigError';
  }
}

function readPositiveMs(env: Record<string, string | undefined>, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new PreviewConfigError(`${key} must be a positive number of milliseconds, got "${raw}"`);
  }
  return value;
}

export function loadPreviewConfig(
  env: Record<string, string | undefined> = runtimeEnv() ?? {}
): PreviewConfig {
  const config: PreviewConfig = {
    stopMotionFrameIntervalMs:
      readPositiveMs(env, 'STOP_MOTION_FRAME_INTERVAL_MS') ?? STOP_MOTION_FRAME_INTERVAL_MS
  };
  const stallTimeout = readPositiveMs(env, 'DECODER_STALL_TIMEOUT_MS');
  if (stallTimeout !== undefined) config.decoderStallTimeoutMs = stallTimeout;
  return config;
}
