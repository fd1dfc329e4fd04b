import { access, readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { setTimeout as sleepFor } from 'node:timers/promises';
import type { z } from 'zod';
import { RunwayApiClient } from './apiClient.js';
import { NotFoundError, ResponseFormatError, UnsupportedFormatError, ValidationError } from './errors.js';
import { loadRuntimeConfig } from './config.js';
import { createLogger, logger as rootLogger, type Logger } from './logger.js';
import {
  TERMINAL_FAILURE_STATUSES,
  VIDEO_DURATIONS,
  VIDEO_RATIOS,
  createTaskResponseSchema,
  isVideoDuration,
  isVideoRatio,
  taskStatusSchema,
  type CreateTaskResponse,
  type CreateVideoOptions,
  type ImageToVideoPayload,
  type TaskStatus,
  type WaitOptions,
  type WaitResult
} from './types.js';

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface VideoGeneratorOptions {
  apiClient?: RunwayApiClient;
  apiKey?: string;
  logger?: Logger;
  sleep?: SleepFn;
  now?: () => number;
  pollIntervalSeconds?: number;
  timeoutSeconds?: number;
}

const defaultSleep: SleepFn = async (ms, signal) => {
  await sleepFor(ms, undefined, { signal });
};

function mimeTypeFor(format: string): string {
  switch (format) {
    case 'jpg':
    case 'jpeg':
      return 'image/jpeg';
    case 'png':
      return 'image/png';
    default:
      throw new UnsupportedFormatError(format);
  }
}

// fs errors may come from another realm, so match on the code only
function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

export class VideoGenerator {
  readonly apiClient: RunwayApiClient;
  private readonly logger: Logger;
  private readonly sleep: SleepFn;
  private readonly now: () => number;
  private readonly pollIntervalSeconds: number;
  private readonly timeoutSeconds: number;

  /**
   * Builds a generator from environment settings (credential, base URL, polling
   * defaults and log level). Call `loadDotenv()` first to pick up a `.env` file.
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): VideoGenerator {
    const config = loadRuntimeConfig(env);
    const logger = createLogger({ level: config.LOG_LEVEL });
    const apiClient = new RunwayApiClient({
      apiKey: config.RUNWAYML_API_SECRET,
      baseUrl: config.RUNWAYML_BASE_URL,
      env,
      logger: logger.child({ module: 'api-client' })
    });

    return new VideoGenerator({
      apiClient,
      logger: logger.child({ module: 'video-generator' }),
      pollIntervalSeconds: config.RUNWAYML_POLL_INTERVAL_SECONDS,
      timeoutSeconds: config.RUNWAYML_TIMEOUT_SECONDS
    });
  }

  constructor(options: VideoGeneratorOptions = {}) {
    this.logger = options.logger ?? rootLogger.child({ module: 'video-generator' });
    this.apiClient =
      options.apiClient ??
      new RunwayApiClient({
        apiKey: options.apiKey,
        logger: options.logger?.child({ module: 'api-client' })
      });
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
    this.pollIntervalSeconds = options.pollIntervalSeconds ?? 5;
    this.timeoutSeconds = options.timeoutSeconds ?? 300;
    this.logger.info('VideoGenerator initialized');
  }

  /**
   * Reads an image and returns it as a `data:<mime>;base64,...` URI.
   * The format is checked after the file has been read.
   */
  async encodeImageToBase64(imagePath: string): Promise<string> {
    try {
      await access(imagePath);
    } catch (error) {
      if (isMissingFile(error)) {
        throw new NotFoundError(imagePath);
      }
      throw error;
    }

    const encoded = (await readFile(imagePath)).toString('base64');

    const format = extname(imagePath).toLowerCase().replace(/^\./, '');
    const mimeType = mimeTypeFor(format);

    return `data:${mimeType};base64,${encoded}`;
  }

  async createVideoFromImage(options: CreateVideoOptions): Promise<CreateTaskResponse> {
    const {
      imagePath,
      promptText,
      duration = 5,
      ratio = '1280:720',
      model = 'gen4_turbo',
      seed,
      watermark = false
    } = options;

    if (!isVideoDuration(duration)) {
      throw new ValidationError(`Duration must be one of ${VIDEO_DURATIONS.join(', ')} seconds`);
    }
    if (!isVideoRatio(ratio)) {
      throw new ValidationError(`Invalid ratio. Must be one of: ${VIDEO_RATIOS.join(', ')}`);
    }
    if (seed !== undefined && !Number.isInteger(seed)) {
      throw new ValidationError('Seed must be an integer');
    }

    const promptImage = await this.encodeImageToBase64(imagePath);

    const payload: ImageToVideoPayload = {
      model,
      prompt_image: promptImage,
      prompt_text: promptText,
      duration,
      ratio,
      watermark
    };
    if (seed !== undefined) {
      payload.seed = seed;
    }

    this.logger.info({ model, duration, ratio }, 'Creating video generation task');
    const raw = await this.apiClient.request('POST', '/image-to-video', payload);
    const response = this.decode(createTaskResponseSchema, raw, '/image-to-video');

    this.logger.info({ taskId: response.id ?? 'Unknown ID' }, 'Video generation task created');
    return response;
  }

  async getTaskStatus(taskId: string, signal?: AbortSignal): Promise<TaskStatus> {
    const endpoint = `/tasks/${encodeURIComponent(taskId)}`;
    const raw = await this.apiClient.request('GET', endpoint, undefined, { signal });
    return this.decode(taskStatusSchema, raw, endpoint);
  }

  async cancelTask(taskId: string): Promise<void> {
    await this.apiClient.request('DELETE', `/tasks/${encodeURIComponent(taskId)}`);
    this.logger.info({ taskId }, 'Task canceled');
  }

  /**
   * Polls a task until it completes, fails, is canceled, or the timeout passes.
   *
   * Failed and canceled tasks resolve with `success: false`; a timeout resolves with
   * the synthetic status `timeout`. Errors from the status request itself reject,
   * as does aborting `signal`.
   */
  async waitForCompletion(taskId: string, options: WaitOptions = {}): Promise<WaitResult> {
    const {
      pollIntervalSeconds = this.pollIntervalSeconds,
      timeoutSeconds = this.timeoutSeconds,
      signal
    } = options;
    const startedAt = this.now();

    while (this.now() - startedAt < timeoutSeconds * 1000) {
      signal?.throwIfAborted();
      const task = await this.getTaskStatus(taskId, signal);

      this.logger.info({ taskId, status: task.status }, 'Task status');

      if (task.status === 'completed') {
        this.logger.info({ taskId }, 'Task completed successfully');
        return { success: true, task };
      }
      if (task.status !== undefined && TERMINAL_FAILURE_STATUSES.has(task.status)) {
        this.logger.error(
          { taskId, status: task.status, error: task.error ?? task.failure ?? 'Unknown error' },
          'Task did not complete'
        );
        return { success: false, task };
      }

      this.logger.debug({ taskId, pollIntervalSeconds }, 'Task still processing');
      await this.sleep(pollIntervalSeconds * 1000, signal);
    }

    this.logger.warn({ taskId, timeoutSeconds }, 'Timeout waiting for task to complete');
    return { success: false, task: { status: 'timeout' } };
  }

  private decode<T extends z.ZodTypeAny>(schema: T, raw: unknown, endpoint: string): z.infer<T> {
    const result = schema.safeParse(raw);
    if (!result.success) {
      this.logger.error({ endpoint, issues: result.error.issues }, 'Unexpected response shape');
      throw new ResponseFormatError(`${endpoint} returned an unexpected response shape`, JSON.stringify(raw));
    }
    return result.data;
  }
}
