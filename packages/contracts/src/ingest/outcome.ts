/**
 * Result of ingesting one file.
 */
export type IngestOutcome =
  | {
      status: 'committed';
      filePath: string;
      accessKey: string;
      itemCount: number;
      /** Final location in the processed area */
      destination: string;
    }
  | {
      status: 'rejected';
      filePath: string;
      reason: Error;
      /** Final location in the error area, null when the file could not be moved */
      destination: string | null;
    };

/**
 * Counters kept by a running pipeline.
 */
export interface IngestStats {
  committed: number;
  rejected: number;
  /** Rejected files that could not be moved to the error area */
  unresolved: number;
  /** Live notifications skipped because the file was gone after settling */
  vanished: number;
}

/**
 * Optional observers for pipeline outcomes.
 */
export interface IngestEvents {
  onCommitted?: (outcome: Extract<IngestOutcome, { status: 'committed' }>) => void;
  onRejected?: (outcome: Extract<IngestOutcome, { status: 'rejected' }>) => void;
}
