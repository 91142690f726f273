/**
 * Sleep for specified milliseconds
 */
export async function sleep(ms: number): Promise<void> {
  if (ms <= 0) return;
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export type Sleeper = (ms: number) => Promise<void>;
