import { spawn } from 'child_process';
import { AppError, ErrorType } from '../utils/error-handler';
import { Logger } from '../utils/logger';

export interface RunOptions {
  /** Kill the child after this many milliseconds */
  timeoutMs: number;
  cwd?: string;
  /** Called with each complete line of stdout and stderr */
  onLine?: (line: string) => void;
}

export interface ProcessResult {
  exitCode: number | null;
  /** Set when the child was ended by a signal rather than exiting */
  signal?: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface ProcessRunner {
  run(command: string, args: string[], options: RunOptions): Promise<ProcessResult>;
}

function lineSplitter(onLine: (line: string) => void) {
  let buffered = '';
  return {
    push(chunk: string) {
      buffered += chunk;
      const lines = buffered.split(/\r?\n|\r/);
      buffered = lines.pop() ?? '';
      for (const line of lines) {
        if (line.trim()) onLine(line.trim());
      }
    },
    flush() {
      if (buffered.trim()) onLine(buffered.trim());
      buffered = '';
    },
  };
}

/**
 * Runs external binaries with an argument array (no shell) and a hard timeout
 */
export class SpawnProcessRunner implements ProcessRunner {
  run(command: string, args: string[], options: RunOptions): Promise<ProcessResult> {
    return new Promise<ProcessResult>((resolve, reject) => {
      Logger.debug(`Running ${command}`, { args, cwd: options.cwd });

      const child = spawn(command, args, {
        cwd: options.cwd,
        stdio: ['ignore', 'pipe', 'pipe'],
        windowsHide: true,
      });

      let stdout = '';
      let stderr = '';
      let timedOut = false;
      let settled = false;
      const outLines = options.onLine ? lineSplitter(options.onLine) : null;
      const errLines = options.onLine ? lineSplitter(options.onLine) : null;

      const timer = setTimeout(() => {
        timedOut = true;
        Logger.warn(`${command} timed out after ${options.timeoutMs}ms, killing it`);
        child.kill('SIGKILL');
      }, options.timeoutMs);

      child.stdout.setEncoding('utf8');
      child.stderr.setEncoding('utf8');

      child.stdout.on('data', (chunk: string) => {
        stdout += chunk;
        outLines?.push(chunk);
      });
      child.stderr.on('data', (chunk: string) => {
        stderr += chunk;
        errLines?.push(chunk);
      });

      child.on('error', (err: NodeJS.ErrnoException) => {
        clearTimeout(timer);
        if (settled) return;
        settled = true;
        const type = err.code === 'ENOENT' ? ErrorType.MissingDependency : ErrorType.ProcessFailed;
        reject(
          new AppError(type, err.code === 'ENOENT' ? command : err.message, { operation: 'spawn', resource: command }, err),
        );
      });

      child.on('close', (code, signal) => {
        clearTimeout(timer);
        if (settled) return;
        settled = true;
        outLines?.flush();
        errLines?.flush();
        resolve({ exitCode: code, signal, stdout, stderr, timedOut });
      });
    });
  }
}

/**
 * Short description of why a process failed, for logs and the failure record
 */
export function describeFailure(result: ProcessResult, tailLines = 5): string {
  if (result.timedOut) {
    return 'timed out';
  }
  const output = `${result.stderr}\n${result.stdout}`
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean)
    .slice(-tailLines)
    .join(' | ');
  const status =
    result.exitCode === null ? `terminated by signal ${result.signal ?? 'unknown'}` : `exit code ${result.exitCode}`;
  return `${status}${output ? `: ${output}` : ''}`;
}
