/**
 * STL Relay: Command Converter
 *
 * Runs an external image-to-STL program once per request:
 *
 *   <command> [args...] --base T|F --smooth T|F --negative T|F
 *             --border N --size N --scale X <image file> <stl file>
 *
 * The decoded image is written to a temporary file in the work directory
 * and removed once the program exits.
 */

import { spawn, type SpawnOptions } from 'node:child_process';
import * as crypto from 'node:crypto';
import type { EventEmitter } from 'node:events';
import * as fs from 'node:fs';
import * as path from 'node:path';
import type { Readable } from 'node:stream';

import { ConfigError, ConversionError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import type { ConversionRequest, ConverterSection } from '../shared/types.js';
import { mediaTypeOf } from './data-uri.js';
import type { Converter } from './types.js';

const log = createLogger('command-converter');

/** Last bytes of stderr kept for error messages. */
const STDERR_TAIL_BYTES = 2048;

const EXTENSIONS: Record<string, string> = {
  'image/png': '.png',
  'image/jpeg': '.jpg',
  'image/gif': '.gif',
  'image/bmp': '.bmp',
  'image/webp': '.webp',
  'image/tiff': '.tiff',
};

/** The part of ChildProcess the converter relies on. */
export interface ConverterProcess extends EventEmitter {
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type SpawnProcess = (command: string, args: string[], options: SpawnOptions) => ConverterProcess;

export interface CommandConverterOptions {
  command: string;
  args?: string[];
  workDir: string;
  timeoutMs: number;
  spawnProcess?: SpawnProcess;
}

function flag(value: boolean): string {
  return value ? 'True' : 'False';
}

export function buildConverterArgs(
  baseArgs: readonly string[],
  request: ConversionRequest,
  imagePath: string,
): string[] {
  return [
    ...baseArgs,
    '--base', flag(request.includeBase),
    '--smooth', flag(request.smooth),
    '--negative', flag(request.negative),
    '--border', String(request.border),
    '--size', String(request.size),
    '--scale', String(request.scale),
    imagePath,
    request.stlPath,
  ];
}

export function imageExtension(request: ConversionRequest): string {
  const mediaType = mediaTypeOf(request.imageParameters);
  return (mediaType && EXTENSIONS[mediaType.toLowerCase()]) ?? '.bin';
}

export class CommandConverter implements Converter {
  private readonly spawnProcess: SpawnProcess;

  constructor(private readonly options: CommandConverterOptions) {
    this.spawnProcess = options.spawnProcess ?? ((command, args, spawnOptions) => spawn(command, args, spawnOptions));
  }

  static fromConfig(section: ConverterSection, spawnProcess?: SpawnProcess): CommandConverter {
    if (!section.command) {
      throw new ConfigError('converter.command is not configured');
    }
    return new CommandConverter({
      command: section.command,
      args: section.args,
      workDir: section.work_dir,
      timeoutMs: section.timeout_ms,
      ...(spawnProcess ? { spawnProcess } : {}),
    });
  }

  async convert(request: ConversionRequest): Promise<string> {
    fs.mkdirSync(this.options.workDir, { recursive: true });
    const imagePath = path.join(this.options.workDir, `${crypto.randomUUID()}${imageExtension(request)}`);
    fs.writeFileSync(imagePath, request.image);

    try {
      await this.run(buildConverterArgs(this.options.args ?? [], request, imagePath));
      return request.stlPath;
    } finally {
      try {
        fs.rmSync(imagePath, { force: true });
      } catch (err) {
        log.warn(`Could not remove ${imagePath}:`, err);
      }
    }
  }

  private run(args: string[]): Promise<void> {
    const { command, timeoutMs } = this.options;

    return new Promise<void>((resolve, reject) => {
      let settled = false;
      let stderrTail = '';

      log.info('Starting converter', { command, args });

      const child = this.spawnProcess(command, args, {
        stdio: ['ignore', 'ignore', 'pipe'],
        cwd: this.options.workDir,
      });

      const settle = (error: Error | null): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (error) reject(error);
        else resolve();
      };

      const timer = setTimeout(() => {
        child.kill('SIGKILL');
        settle(new ConversionError(`Converter did not finish within ${timeoutMs}ms`));
      }, timeoutMs);

      child.stderr?.on('data', (chunk: Buffer) => {
        stderrTail = (stderrTail + chunk.toString('utf8')).slice(-STDERR_TAIL_BYTES);
      });

      child.once('error', (err: Error) => {
        settle(new ConversionError(`Failed to start converter "${command}": ${err.message}`, err));
      });

      child.once('exit', (code: number | null, signal: NodeJS.Signals | null) => {
        if (code === 0) {
          settle(null);
          return;
        }
        const status = code !== null ? `exit code ${code}` : `signal ${signal ?? 'unknown'}`;
        const detail = stderrTail.trim();
        settle(new ConversionError(`Converter failed with ${status}${detail ? `: ${detail}` : ''}`));
      });
    });
  }
}
