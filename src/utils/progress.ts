/**
 * Progress information for long-running CLI operations
 */
export interface ProgressInfo {
  stage: string; // e.g. "Downloading", "Tagging"
  current: number;
  total: number;
  message?: string;
}

export type ProgressCallback = (progress: ProgressInfo) => void;

export const noopProgress: ProgressCallback = () => {
  // No operation
};

export function getPercentage(progress: ProgressInfo): number {
  if (progress.total === 0) return 0;
  return Math.round((progress.current / progress.total) * 100);
}

export function formatProgress(progress: ProgressInfo): string {
  let message = progress.stage;

  if (progress.total > 0) {
    message += `: ${progress.current}/${progress.total} (${getPercentage(progress)}%)`;
  }

  if (progress.message) {
    message += ` - ${progress.message}`;
  }

  return message;
}
