import type { Size } from '../image/codec.js';
import type { DisplaySink, RasterImage } from '../types/types.js';
import { mkdir, mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import open from 'open';
import { DISPLAY_FILE_NAME, DISPLAY_FILE_PREFIX, DISPLAY_FRAME } from '../constants.js';
import { encodePng } from '../image/codec.js';

export interface OpenerOptions {
  wait: boolean;
  app?: { name: string };
}

export type Opener = (target: string, options: OpenerOptions) => Promise<unknown>;

export interface ImageViewerOptions {
  outputDir?: string;
  frame?: Size;
  opener?: Opener;
  /** Viewer application to launch; lets `open` wait on platforms whose default opener returns at once. */
  app?: string;
}

/**
 * Largest size with the image's aspect ratio that fits inside `frame`.
 */
export function fitWithin(width: number, height: number, frame: Size): Size {
  const scale = Math.min(frame.width / width, frame.height / height);
  return {
    width: Math.max(1, Math.round(width * scale)),
    height: Math.max(1, Math.round(height * scale)),
  };
}

/**
 * Shows rasters in the system image viewer and waits for it to be closed.
 * Every image goes to the same file, so a run leaves at most one PNG behind.
 */
export class ImageViewer implements DisplaySink {
  private readonly frame: Size;
  private readonly opener: Opener;
  private readonly app: string | undefined;
  private readonly configuredDir: string | undefined;
  private outputDir: Promise<string> | undefined;

  constructor({ outputDir, frame = DISPLAY_FRAME, opener = open, app }: ImageViewerOptions = {}) {
    this.frame = frame;
    this.opener = opener;
    this.app = app;
    this.configuredDir = outputDir;
  }

  public async show(image: RasterImage): Promise<void> {
    const png = await encodePng(image, fitWithin(image.width, image.height, this.frame));
    const file = path.join(await this.resolveOutputDir(), DISPLAY_FILE_NAME);
    await writeFile(file, png);
    await this.opener(file, this.app ? { wait: true, app: { name: this.app } } : { wait: true });
  }

  private resolveOutputDir(): Promise<string> {
    const configuredDir = this.configuredDir;
    this.outputDir ??= configuredDir
      ? mkdir(configuredDir, { recursive: true }).then(() => configuredDir)
      : mkdtemp(path.join(tmpdir(), DISPLAY_FILE_PREFIX));
    return this.outputDir;
  }
}
