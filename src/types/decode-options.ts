/**
 * Options accepted when decoding an archive.
 */
export interface DecodeOptions {
  /** Reject format deviations that are otherwise only reported as warnings. */
  readonly strict?: boolean;
  /** Receives warnings; defaults to `console.warn`. */
  readonly onWarning?: (message: string) => void;
}
