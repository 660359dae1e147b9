import type { Platform } from '../shared/platform.js';
import type { FormattedPost } from './formatter.js';

export interface AdapterResult {
  success: boolean;
  remoteId?: string;
  url?: string;
  error?: string;
  /** `false` stops the retry loop for this failure. Defaults to retryable. */
  retryable?: boolean;
}

export interface AdapterStatus {
  healthy: boolean;
  detail?: string;
}

/**
 * Platform client contract. Implementations throw `AdapterAuthError` for
 * credential problems; any other thrown error counts as transient.
 */
export interface PlatformAdapter {
  readonly platform: Platform;
  authenticate(): Promise<boolean>;
  postContent(formatted: FormattedPost): Promise<AdapterResult>;
  checkStatus(): Promise<AdapterStatus>;
}

export type AdapterRegistry = Partial<Record<Platform, PlatformAdapter>>;
