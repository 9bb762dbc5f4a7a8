import { z } from 'zod';

export const QUALITY_PRESETS = ['low', 'medium', 'high', 'ultra'] as const;
export type QualityPreset = typeof QUALITY_PRESETS[number];

/** Single-letter renderer flag and output directory name for each preset. */
export const QUALITY_SETTINGS: Record<QualityPreset, { flag: string; directory: string }> = {
  low: { flag: 'l', directory: '480p15' },
  medium: { flag: 'm', directory: '720p30' },
  high: { flag: 'h', directory: '1080p60' },
  ultra: { flag: 'k', directory: '2160p60' },
};

export const OUTPUT_FORMATS = ['mp4', 'mov', 'gif', 'webm'] as const;
export type OutputFormat = typeof OUTPUT_FORMATS[number];

export const DEFAULT_TIMEOUT_SECONDS = 30;
/** Longest delay a Node timer accepts, in whole seconds. */
export const MAX_TIMEOUT_SECONDS = 2_147_483;

export const RenderConfigSchema = z.object({
  quality: z.enum(QUALITY_PRESETS).default('low'),
  format: z.enum(OUTPUT_FORMATS).default('mp4'),
  timeoutSeconds: z.number().positive().max(MAX_TIMEOUT_SECONDS).default(DEFAULT_TIMEOUT_SECONDS),
  /** Media root for renderer output; each job still gets its own subtree. */
  outputDir: z.string().min(1).optional(),
  disableCaching: z.boolean().default(true),
});

export type RenderConfig = z.infer<typeof RenderConfigSchema>;
export type RenderConfigInput = z.input<typeof RenderConfigSchema>;

export function resolveRenderConfig(input: RenderConfigInput = {}): RenderConfig {
  return RenderConfigSchema.parse(input);
}

/**
 * Accepts a preset name or its single-letter flag ("m", "high", ...).
 * Anything else maps to `low`.
 */
export function resolveQuality(value: string): QualityPreset {
  const normalized = value.trim().toLowerCase();
  for (const preset of QUALITY_PRESETS) {
    if (preset === normalized || QUALITY_SETTINGS[preset].flag === normalized) return preset;
  }
  return 'low';
}

export function qualityDirectory(preset: string): string {
  return QUALITY_SETTINGS[resolveQuality(preset)].directory;
}

/** Command used to launch the external renderer; job arguments are appended. */
export interface RendererCommand {
  command: string;
  args: string[];
  env?: Record<string, string>;
}

export const DEFAULT_RENDERER: RendererCommand = { command: 'manim', args: ['render'] };

export function buildRendererArgs(
  renderer: RendererCommand,
  job: { sourcePath: string; entryPoint: string; mediaDir: string; config: RenderConfig },
): string[] {
  const { config } = job;
  const args = [
    ...renderer.args,
    job.sourcePath,
    job.entryPoint,
    `-q${QUALITY_SETTINGS[config.quality].flag}`,
    '--format',
    config.format,
    '--media_dir',
    job.mediaDir,
  ];
  if (config.disableCaching) args.push('--disable_caching');
  return args;
}
