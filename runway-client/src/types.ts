import { z } from 'zod';

export const VIDEO_DURATIONS = [5, 10] as const;
export type VideoDuration = (typeof VIDEO_DURATIONS)[number];

export const VIDEO_RATIOS = ['1280:720', '720:1280', '1104:832', '832:1104', '960:960', '1584:672'] as const;
export type VideoRatio = (typeof VIDEO_RATIOS)[number];

export const TERMINAL_FAILURE_STATUSES: ReadonlySet<string> = new Set(['failed', 'canceled']);

export function isVideoDuration(value: number): value is VideoDuration {
  return VIDEO_DURATIONS.some((duration) => duration === value);
}

export function isVideoRatio(value: string): value is VideoRatio {
  return VIDEO_RATIOS.some((ratio) => ratio === value);
}

export type RequestPayload = Record<string, unknown>;

export type ImageToVideoPayload = {
  model: string;
  prompt_image: string;
  prompt_text: string;
  duration: VideoDuration;
  ratio: VideoRatio;
  watermark: boolean;
  seed?: number;
};

export interface CreateVideoOptions {
  imagePath: string;
  promptText: string;
  duration?: number;
  ratio?: string;
  model?: string;
  seed?: number;
  watermark?: boolean;
}

export interface WaitOptions {
  pollIntervalSeconds?: number;
  timeoutSeconds?: number;
  signal?: AbortSignal;
}

// Remote responses keep every field they carry; only the ones the client
// reads are typed. A field of the wrong type decodes as absent.
export const createTaskResponseSchema = z
  .object({
    id: z.string().optional().catch(undefined)
  })
  .passthrough();

export type CreateTaskResponse = z.infer<typeof createTaskResponseSchema>;

export const taskStatusSchema = z
  .object({
    id: z.string().optional().catch(undefined),
    status: z.string().optional().catch(undefined),
    progress: z.number().optional().catch(undefined),
    output: z.array(z.string()).optional().catch(undefined),
    error: z.string().optional().catch(undefined),
    failure: z.string().optional().catch(undefined),
    failureCode: z.string().optional().catch(undefined),
    createdAt: z.string().optional().catch(undefined)
  })
  .passthrough();

export type TaskStatus = z.infer<typeof taskStatusSchema>;

export interface WaitResult {
  success: boolean;
  task: TaskStatus;
}
