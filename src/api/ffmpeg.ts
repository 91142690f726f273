import { ProcessRunner, ProcessResult } from '../services/process-runner';
import { AppError, ErrorType } from '../utils/error-handler';

export interface FfmpegTimeouts {
  infoTimeoutMs: number;
  downloadTimeoutMs: number;
  tagTimeoutMs: number;
}

/**
 * Thin client over the ffmpeg binary. Every invocation stream-copies; nothing is re-encoded.
 */
export class FfmpegClient {
  constructor(
    private runner: ProcessRunner,
    private binary: string,
    private timeouts: FfmpegTimeouts,
  ) {}

  get command(): string {
    return this.binary;
  }

  async isAvailable(): Promise<boolean> {
    try {
      const result = await this.runner.run(this.binary, ['-version'], { timeoutMs: this.timeouts.infoTimeoutMs });
      return result.exitCode === 0;
    } catch (error) {
      if (error instanceof AppError && error.type === ErrorType.MissingDependency) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Re-mux a remote audio stream into a local file without re-encoding
   */
  copyStream(inputUrl: string, outputPath: string): Promise<ProcessResult> {
    return this.runner.run(this.binary, ['-i', inputUrl, '-c', 'copy', '-vn', '-y', outputPath], {
      timeoutMs: this.timeouts.downloadTimeoutMs,
    });
  }

  /**
   * Copy inputPath to outputPath, keeping existing metadata and setting the given keys
   */
  writeMetadata(inputPath: string, outputPath: string, tags: Array<[string, string]>): Promise<ProcessResult> {
    const metadataArgs = tags.flatMap(([key, value]) => ['-metadata', `${key}=${value}`]);
    return this.runner.run(
      this.binary,
      ['-i', inputPath, '-c', 'copy', '-map_metadata', '0', ...metadataArgs, '-y', outputPath],
      { timeoutMs: this.timeouts.tagTimeoutMs },
    );
  }
}
