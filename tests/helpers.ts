import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { buildOpusTags, paginatePacket, serializeOggPage } from '../src/services/opus-tags';
import { ProcessResult, ProcessRunner, RunOptions } from '../src/services/process-runner';
import { Prompter } from '../src/utils/prompt';

export interface RecordedCall {
  command: string;
  args: string[];
  options: RunOptions;
}

type Responder = (call: RecordedCall) => Partial<ProcessResult> | Promise<Partial<ProcessResult>>;

/**
 * ProcessRunner that answers from a queue of responders and records every call
 */
export class ScriptedRunner implements ProcessRunner {
  readonly calls: RecordedCall[] = [];
  private responders: Responder[] = [];

  enqueue(...responders: Array<Responder | Partial<ProcessResult>>): this {
    for (const responder of responders) {
      this.responders.push(typeof responder === 'function' ? responder : () => responder);
    }
    return this;
  }

  async run(command: string, args: string[], options: RunOptions): Promise<ProcessResult> {
    const call = { command, args, options };
    this.calls.push(call);
    const responder = this.responders.shift();
    if (!responder) {
      throw new Error(`Unexpected call: ${command} ${args.join(' ')}`);
    }
    const result = await responder(call);
    return { exitCode: 0, stdout: '', stderr: '', timedOut: false, ...result };
  }
}

/**
 * Prompter that replays canned answers, then behaves like closed input
 */
export class ScriptedPrompter implements Prompter {
  readonly questions: string[] = [];

  constructor(private answers: string[]) {}

  async ask(question: string): Promise<string | null> {
    this.questions.push(question);
    const answer = this.answers.shift();
    return answer === undefined ? null : answer;
  }

  close(): void {
    this.answers = [];
  }
}

export function makeTempDir(prefix = 'opus-shelf-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function touch(dir: string, name: string, content: string | Buffer = 'x'): string {
  const file = path.join(dir, name);
  fs.writeFileSync(file, content);
  return file;
}

const ANSI_PATTERN = /\u001b\[[0-9;]*m/g;

/**
 * Every line passed to a console spy, without colour codes
 */
export function printedLines(spy: jest.SpyInstance): string[] {
  return spy.mock.calls.map((call: unknown[]) => call.map((part) => String(part ?? '')).join(' ').replace(ANSI_PATTERN, ''));
}

/**
 * Minimal Ogg Opus file: identification header, comment header and one audio page
 */
export function buildOpusFile(comments: string[] = []): Buffer {
  const head = Buffer.alloc(19);
  head.write('OpusHead', 0, 'ascii');
  head.writeUInt8(1, 8);
  head.writeUInt8(2, 9);
  head.writeUInt32LE(48000, 12);

  const tags = buildOpusTags({ vendor: 'test-encoder', comments, trailing: Buffer.alloc(0) });
  const audio = Buffer.from('audio-packet', 'ascii');
  return Buffer.concat([
    ...paginatePacket(head, 1, 0).map((page) => serializeOggPage({ ...page, headerType: 0x02 })),
    ...paginatePacket(tags, 1, 1).map(serializeOggPage),
    serializeOggPage({ headerType: 0x04, granulePosition: 960n, serial: 1, sequence: 2, segments: [audio.length], body: audio }),
  ]);
}
