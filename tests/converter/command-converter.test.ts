/**
 * STL Relay: Command Converter Tests
 *
 * The converter process is faked; only the temp image file touches disk.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { EventEmitter } from 'node:events';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { PassThrough } from 'node:stream';
import type { SpawnOptions } from 'node:child_process';
import {
  CommandConverter,
  buildConverterArgs,
  imageExtension,
  type SpawnProcess,
} from '../../src/converter/command-converter.js';
import { ConfigError, ConversionError } from '../../src/shared/errors.js';
import type { ConversionRequest } from '../../src/shared/types.js';

vi.mock('../../src/shared/logger.js', () => ({
  createLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

// =============================================================================
// Helpers
// =============================================================================

class FakeProcess extends EventEmitter {
  readonly stderr = new PassThrough();
  killedWith: NodeJS.Signals | number | undefined;

  kill(signal?: NodeJS.Signals | number): boolean {
    this.killedWith = signal;
    return true;
  }
}

interface SpawnCall {
  command: string;
  args: string[];
  options: SpawnOptions;
  imageExisted: boolean;
}

/** Spawner whose process is driven by `script` on the next tick. */
function fakeSpawn(script: (child: FakeProcess) => void): { spawnProcess: SpawnProcess; calls: SpawnCall[] } {
  const calls: SpawnCall[] = [];
  const spawnProcess: SpawnProcess = (command, args, options) => {
    const imagePath = args[args.length - 2] ?? '';
    calls.push({ command, args, options, imageExisted: fs.existsSync(imagePath) });
    const child = new FakeProcess();
    setImmediate(() => script(child));
    return child;
  };
  return { spawnProcess, calls };
}

function makeRequest(overrides: Partial<ConversionRequest> = {}): ConversionRequest {
  return {
    image: Buffer.from('pixels'),
    imageParameters: ['image/png', 'base64'],
    stlPath: '/out/shape.stl',
    includeBase: false,
    smooth: true,
    negative: false,
    border: 100,
    size: 256,
    scale: 0.1,
    ...overrides,
  };
}

let workDir: string;

beforeEach(() => {
  workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'stl-relay-converter-'));
});

afterEach(() => {
  fs.rmSync(workDir, { recursive: true, force: true });
});

// =============================================================================
// Arguments
// =============================================================================

describe('buildConverterArgs', () => {
  it('passes the options as flags, then the image and stl paths', () => {
    const args = buildConverterArgs(['convert.py'], makeRequest({ negative: true, scale: 0.5 }), '/tmp/in.png');

    expect(args).toEqual([
      'convert.py',
      '--base', 'False',
      '--smooth', 'True',
      '--negative', 'True',
      '--border', '100',
      '--size', '256',
      '--scale', '0.5',
      '/tmp/in.png',
      '/out/shape.stl',
    ]);
  });
});

describe('imageExtension', () => {
  it('maps known image types', () => {
    expect(imageExtension(makeRequest({ imageParameters: ['image/JPEG', 'base64'] }))).toBe('.jpg');
  });

  it('falls back to .bin', () => {
    expect(imageExtension(makeRequest({ imageParameters: ['base64'] }))).toBe('.bin');
    expect(imageExtension(makeRequest({ imageParameters: ['application/x-raw', 'base64'] }))).toBe('.bin');
  });
});

// =============================================================================
// Conversion
// =============================================================================

describe('CommandConverter', () => {
  it('runs the command in the work dir and resolves with the stl path', async () => {
    const { spawnProcess, calls } = fakeSpawn((child) => child.emit('exit', 0, null));
    const converter = new CommandConverter({ command: 'img2stl', args: ['--quiet'], workDir, timeoutMs: 1000, spawnProcess });

    await expect(converter.convert(makeRequest())).resolves.toBe('/out/shape.stl');

    expect(calls).toHaveLength(1);
    const [call] = calls;
    if (!call) throw new Error('converter was not spawned');
    expect(call.command).toBe('img2stl');
    expect(call.args[0]).toBe('--quiet');
    expect(call.options.cwd).toBe(workDir);
    expect(call.imageExisted).toBe(true);
    expect(path.extname(call.args[call.args.length - 2] ?? '')).toBe('.png');
  });

  it('removes the temporary image once the command exits', async () => {
    const { spawnProcess } = fakeSpawn((child) => child.emit('exit', 0, null));
    const converter = new CommandConverter({ command: 'img2stl', workDir, timeoutMs: 1000, spawnProcess });

    await converter.convert(makeRequest());
    expect(fs.readdirSync(workDir)).toEqual([]);
  });

  it('reports a non-zero exit with the tail of stderr', async () => {
    const { spawnProcess } = fakeSpawn((child) => {
      child.stderr.write('bad image\n');
      setImmediate(() => child.emit('exit', 2, null));
    });
    const converter = new CommandConverter({ command: 'img2stl', workDir, timeoutMs: 1000, spawnProcess });

    const error = await converter.convert(makeRequest()).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ConversionError);
    expect(error).toHaveProperty('message', 'Converter failed with exit code 2: bad image');
    expect(fs.readdirSync(workDir)).toEqual([]);
  });

  it('reports a process killed by a signal', async () => {
    const { spawnProcess } = fakeSpawn((child) => child.emit('exit', null, 'SIGTERM'));
    const converter = new CommandConverter({ command: 'img2stl', workDir, timeoutMs: 1000, spawnProcess });

    await expect(converter.convert(makeRequest())).rejects.toThrow('Converter failed with signal SIGTERM');
  });

  it('reports a command that cannot be started', async () => {
    const { spawnProcess } = fakeSpawn((child) => child.emit('error', new Error('spawn img2stl ENOENT')));
    const converter = new CommandConverter({ command: 'img2stl', workDir, timeoutMs: 1000, spawnProcess });

    await expect(converter.convert(makeRequest())).rejects.toThrow(
      'Failed to start converter "img2stl": spawn img2stl ENOENT',
    );
  });

  it('kills a command that runs past the timeout', async () => {
    let child: FakeProcess | undefined;
    const { spawnProcess } = fakeSpawn((c) => {
      child = c;
    });
    const converter = new CommandConverter({ command: 'img2stl', workDir, timeoutMs: 30, spawnProcess });

    await expect(converter.convert(makeRequest())).rejects.toThrow('Converter did not finish within 30ms');
    expect(child?.killedWith).toBe('SIGKILL');
  });

  it('creates the work dir when it does not exist', async () => {
    const nested = path.join(workDir, 'a', 'b');
    const { spawnProcess } = fakeSpawn((child) => child.emit('exit', 0, null));
    const converter = new CommandConverter({ command: 'img2stl', workDir: nested, timeoutMs: 1000, spawnProcess });

    await converter.convert(makeRequest());
    expect(fs.existsSync(nested)).toBe(true);
  });
});

describe('CommandConverter.fromConfig', () => {
  it('requires a configured command', () => {
    expect(() =>
      CommandConverter.fromConfig({ args: [], work_dir: workDir, timeout_ms: 1000 }),
    ).toThrow(ConfigError);
  });

  it('uses the configured command and arguments', async () => {
    const { spawnProcess, calls } = fakeSpawn((child) => child.emit('exit', 0, null));
    const converter = CommandConverter.fromConfig(
      { command: 'python3', args: ['img2stl.py'], work_dir: workDir, timeout_ms: 1000 },
      spawnProcess,
    );

    await converter.convert(makeRequest());
    expect(calls[0]?.command).toBe('python3');
    expect(calls[0]?.args[0]).toBe('img2stl.py');
  });
});
