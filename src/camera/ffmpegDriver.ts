import ffmpeg from 'fluent-ffmpeg';
import fs from 'node:fs';
import path from 'node:path';
import { PassThrough } from 'node:stream';
import { PNG } from 'pngjs';
import { CameraDriverError, type CameraFailureReason } from '../errors.js';
import logger, { type ComponentLogger } from '../logger.js';
import type { CameraDriver, CameraSettings } from './driver.js';

type Errno = NodeJS.ErrnoException;

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
const DEFAULT_STOP_TIMEOUT_MS = 5000;
const KILL_EXIT_WAIT_MS = 1000;
const DEFAULT_CODEC = 'libx264';
const DEFAULT_INPUT_FORMAT = 'v4l2';
const MAX_STDERR_LINES = 20;

export type FfmpegCommandOptions = {
  device: string;
  inputFormat: string;
  settings: CameraSettings;
  mode: 'frame' | 'record';
  outputPath?: string;
  codec: string;
};

export type FfmpegCameraDriverOptions = {
  device: string;
  inputFormat?: string;
  codec?: string;
  ffmpegPath?: string;
  stopTimeoutMs?: number;
  commandFactory?: (options: FfmpegCommandOptions) => ffmpeg.FfmpegCommand;
  logger?: ComponentLogger;
};

const STDERR_PATTERNS: Array<{ pattern: RegExp; reason: CameraFailureReason }> = [
  { pattern: /device or resource busy/i, reason: 'busy' },
  { pattern: /permission denied/i, reason: 'permission-denied' },
  { pattern: /no such file or directory|no such device|cannot open video device/i, reason: 'not-found' },
  {
    pattern: /invalid argument|not supported|unsupported|could not set video options|invalid (?:pixel format|frame size)/i,
    reason: 'configuration-rejected'
  }
];

export function classifyFfmpegFailure(stderr: string): CameraFailureReason {
  for (const { pattern, reason } of STDERR_PATTERNS) {
    if (pattern.test(stderr)) {
      return reason;
    }
  }
  return 'process-error';
}

function errnoReason(error: Errno): CameraFailureReason {
  switch (error.code) {
    case 'ENOENT':
      return 'not-found';
    case 'EACCES':
    case 'EPERM':
      return 'permission-denied';
    case 'EBUSY':
      return 'busy';
    default:
      return 'unknown';
  }
}

function isDevicePath(device: string): boolean {
  return device.startsWith('/dev/');
}

/**
 * Returns the first complete PNG in `buffer`, or null when the buffer holds none.
 */
export function extractPng(buffer: Buffer): Buffer | null {
  const start = buffer.indexOf(PNG_SIGNATURE);
  if (start === -1) {
    return null;
  }

  let offset = start + PNG_SIGNATURE.length;
  while (offset + 8 <= buffer.length) {
    const length = buffer.readUInt32BE(offset);
    const chunkType = buffer.toString('ascii', offset + 4, offset + 8);
    const chunkEnd = offset + 8 + length + 4;
    if (chunkEnd > buffer.length) {
      return null;
    }
    offset = chunkEnd;
    if (chunkType === 'IEND') {
      return buffer.subarray(start, offset);
    }
  }
  return null;
}

export function createDefaultCommand(options: FfmpegCommandOptions): ffmpeg.FfmpegCommand {
  const { settings } = options;
  const command = ffmpeg(options.device)
    .inputFormat(options.inputFormat)
    .inputOptions([
      '-video_size',
      `${settings.width}x${settings.height}`,
      '-framerate',
      String(settings.framesPerSecond)
    ]);

  if (options.mode === 'frame') {
    return command.outputOptions(['-frames:v', '1', '-f', 'image2pipe', '-vcodec', 'png']);
  }

  if (!options.outputPath) {
    throw new CameraDriverError('configuration-rejected', 'Recording requires an output path');
  }

  return command
    .videoCodec(options.codec)
    .outputOptions(['-pix_fmt', 'yuv420p', '-movflags', '+faststart', '-f', 'mp4'])
    .output(options.outputPath);
}

type ActiveRecording = {
  command: ffmpeg.FfmpegCommand;
  outputPath: string;
  partPath: string;
  exited: Promise<void>;
  hasExited: boolean;
  exitError: Error | null;
  stderr: string[];
};

/**
 * Camera driver backed by an ffmpeg child process reading a V4L2 device. Recordings are
 * written to `<output>.part` and renamed once ffmpeg has flushed the container.
 */
export class FfmpegCameraDriver implements CameraDriver {
  private readonly log: ComponentLogger;
  private settings: CameraSettings | null = null;
  private opened = false;
  private recording: ActiveRecording | null = null;
  private frameCommand: ffmpeg.FfmpegCommand | null = null;

  constructor(private readonly options: FfmpegCameraDriverOptions) {
    this.log = options.logger ?? logger;
  }

  async open(): Promise<void> {
    if (isDevicePath(this.options.device)) {
      try {
        await fs.promises.access(this.options.device, fs.constants.R_OK);
      } catch (error) {
        const err = error as Errno;
        throw new CameraDriverError(errnoReason(err), `Cannot open ${this.options.device}: ${err.message}`, {
          cause: error
        });
      }
    }
    this.opened = true;
  }

  async configure(settings: CameraSettings): Promise<void> {
    this.assertOpen('configure');
    const valid =
      Number.isInteger(settings.width) &&
      Number.isInteger(settings.height) &&
      settings.width > 0 &&
      settings.height > 0 &&
      Number.isFinite(settings.framesPerSecond) &&
      settings.framesPerSecond > 0;
    if (!valid) {
      throw new CameraDriverError(
        'configuration-rejected',
        `Unsupported mode ${settings.width}x${settings.height}@${settings.framesPerSecond}`
      );
    }
    this.settings = { ...settings };
  }

  async captureTestFrame(): Promise<Buffer> {
    const settings = this.requireSettings('captureTestFrame');
    const command = this.createCommand({ mode: 'frame', settings });
    this.frameCommand = command;
    const sink = new PassThrough();
    const chunks: Buffer[] = [];
    const stderr: string[] = [];

    sink.on('data', (chunk: Buffer) => {
      chunks.push(chunk);
    });

    try {
      await new Promise<void>((resolve, reject) => {
        command.on('stderr', (line: string) => {
          pushStderr(stderr, line);
        });
        command.once('error', (error: Error) => {
          reject(this.toDriverError(error, stderr));
        });
        command.once('end', () => {
          resolve();
        });
        try {
          command.pipe(sink, { end: true });
        } catch (error) {
          reject(this.toDriverError(error, stderr));
        }
      });
    } finally {
      if (this.frameCommand === command) {
        this.frameCommand = null;
      }
    }

    const frame = extractPng(Buffer.concat(chunks));
    if (!frame) {
      throw new CameraDriverError('no-frame', `No frame received from ${this.options.device}`);
    }

    let image: PNG;
    try {
      image = PNG.sync.read(frame);
    } catch (error) {
      throw new CameraDriverError('no-frame', `Test frame from ${this.options.device} is not a valid image`, {
        cause: error
      });
    }
    if (image.width <= 0 || image.height <= 0) {
      throw new CameraDriverError('no-frame', `Test frame from ${this.options.device} is empty`);
    }
    return frame;
  }

  async start(outputPath: string): Promise<void> {
    const settings = this.requireSettings('start');
    if (this.recording) {
      throw new CameraDriverError('busy', `${this.options.device} is already recording`);
    }

    const partPath = `${outputPath}.part`;
    await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });

    const command = this.createCommand({ mode: 'record', settings, outputPath: partPath });
    const stderr: string[] = [];

    await new Promise<void>((resolve, reject) => {
      let started = false;
      let markExited: () => void = () => undefined;
      const recording: ActiveRecording = {
        command,
        outputPath,
        partPath,
        exited: new Promise<void>(done => {
          markExited = done;
        }),
        hasExited: false,
        exitError: null,
        stderr
      };

      const onExit = (error: Error | null) => {
        recording.hasExited = true;
        recording.exitError = error;
        markExited();
      };

      command.on('stderr', (line: string) => {
        pushStderr(stderr, line);
      });
      command.once('start', () => {
        started = true;
        this.recording = recording;
        resolve();
      });
      command.once('error', (error: Error) => {
        onExit(error);
        if (!started) {
          reject(this.toDriverError(error, stderr));
          return;
        }
        this.log.warn({ err: error, device: this.options.device }, 'ffmpeg recording exited with error');
      });
      command.once('end', () => {
        onExit(null);
        if (!started) {
          reject(new CameraDriverError('process-error', `ffmpeg exited before recording ${outputPath}`));
        }
      });

      try {
        command.run();
      } catch (error) {
        reject(this.toDriverError(error, stderr));
      }
    });
  }

  async stop(): Promise<void> {
    const recording = this.recording;
    if (!recording) {
      return;
    }

    // Stays registered until the process is gone so close() can still kill it.
    try {
      if (!recording.hasExited) {
        recording.command.kill('SIGINT');
        const timeoutMs = this.options.stopTimeoutMs ?? DEFAULT_STOP_TIMEOUT_MS;
        const timers: NodeJS.Timeout[] = [];
        const forced = new Promise<void>(resolve => {
          timers.push(
            setTimeout(() => {
              this.log.warn({ device: this.options.device }, 'ffmpeg did not exit after SIGINT, killing');
              recording.command.kill('SIGKILL');
              timers.push(setTimeout(resolve, KILL_EXIT_WAIT_MS));
            }, timeoutMs)
          );
        });
        try {
          await Promise.race([recording.exited, forced]);
        } finally {
          timers.forEach(timer => clearTimeout(timer));
        }
      }
    } finally {
      if (this.recording === recording) {
        this.recording = null;
      }
    }

    try {
      await fs.promises.rename(recording.partPath, recording.outputPath);
    } catch (error) {
      throw new CameraDriverError(
        'process-error',
        `Recording ${recording.outputPath} was not produced${
          recording.exitError ? `: ${recording.exitError.message}` : ''
        }`,
        { cause: error }
      );
    }
  }

  async close(): Promise<void> {
    const recording = this.recording;
    this.recording = null;
    if (recording && !recording.hasExited) {
      recording.command.kill('SIGKILL');
    }
    const frameCommand = this.frameCommand;
    this.frameCommand = null;
    if (frameCommand) {
      frameCommand.kill('SIGKILL');
    }
    this.opened = false;
    this.settings = null;
  }

  private createCommand(options: { mode: 'frame' | 'record'; settings: CameraSettings; outputPath?: string }) {
    const commandOptions: FfmpegCommandOptions = {
      device: this.options.device,
      inputFormat: this.options.inputFormat ?? DEFAULT_INPUT_FORMAT,
      codec: this.options.codec ?? DEFAULT_CODEC,
      settings: options.settings,
      mode: options.mode,
      outputPath: options.outputPath
    };

    const factory = this.options.commandFactory ?? createDefaultCommand;
    const command = factory(commandOptions);
    if (this.options.ffmpegPath) {
      command.setFfmpegPath(this.options.ffmpegPath);
    }
    return command;
  }

  private assertOpen(step: string) {
    if (!this.opened) {
      throw new CameraDriverError('process-error', `${step} called before open`);
    }
  }

  private requireSettings(step: string): CameraSettings {
    this.assertOpen(step);
    if (!this.settings) {
      throw new CameraDriverError('configuration-rejected', `${step} called before configure`);
    }
    return this.settings;
  }

  private toDriverError(error: unknown, stderr: string[]): CameraDriverError {
    if (error instanceof CameraDriverError) {
      return error;
    }
    const err: Errno = error instanceof Error ? error : new Error(String(error));
    if ('code' in err && err.code === 'ENOENT' && /spawn/i.test(err.message)) {
      return new CameraDriverError('process-error', 'ffmpeg binary not found', { cause: error });
    }
    const detail = stderr.join('\n');
    const reason = classifyFfmpegFailure(`${err.message}\n${detail}`);
    return new CameraDriverError(reason, `${this.options.device}: ${err.message}`, { cause: error });
  }
}

function pushStderr(buffer: string[], line: string) {
  buffer.push(line);
  if (buffer.length > MAX_STDERR_LINES) {
    buffer.shift();
  }
}
