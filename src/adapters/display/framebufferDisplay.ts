import { writeFile } from 'node:fs/promises';
import { Jimp, loadFont } from 'jimp';
import { fitScale, fitText } from '@/adapters/display/text';
import type { DisplayFrame, DisplayPort } from '@/ports/DisplayPort';
import { createLogger, errorMessage } from '@/shared/logging/logger';

export interface FramebufferDisplayOptions {
  device: string;
  width: number;
  height: number;
  rotation: number;
  /** BMFont (.fnt) used for text; without it only artwork is drawn. */
  fontPath: string | null;
  lineHeight?: number;
  /** Approximate glyph width used to budget characters per line. */
  charWidth?: number;
}

type Font = Awaited<ReturnType<typeof loadFont>>;

/** Packs RGBA pixels into little-endian RGB565. */
export function toRgb565(rgba: Buffer): Buffer {
  const out = Buffer.alloc((rgba.length / 4) * 2);
  for (let src = 0, dst = 0; src + 3 < rgba.length; src += 4, dst += 2) {
    const r = rgba[src] >> 3;
    const g = rgba[src + 1] >> 2;
    const b = rgba[src + 2] >> 3;
    out.writeUInt16LE((r << 11) | (g << 5) | b, dst);
  }
  return out;
}

/**
 * Draws frames onto a Linux framebuffer. Any drawing or write failure hands the
 * remaining frames to the fallback presenter.
 */
export class FramebufferDisplay implements DisplayPort {
  private readonly log = createLogger('Display', 'Framebuffer');
  private font: Font | null = null;
  private fontLoaded = false;
  private failed = false;

  constructor(
    private readonly options: FramebufferDisplayOptions,
    private readonly fallback: DisplayPort,
  ) {}

  public async publish(frame: DisplayFrame): Promise<void> {
    if (this.failed) {
      await this.fallback.publish(frame);
      return;
    }
    try {
      const pixels = await this.render(frame);
      await writeFile(this.options.device, toRgb565(pixels));
    } catch (error) {
      this.failed = true;
      this.log.warn('framebuffer unavailable; using console output', {
        device: this.options.device,
        message: errorMessage(error),
      });
      await this.fallback.publish(frame);
    }
  }

  public async close(): Promise<void> {
    await this.fallback.close();
  }

  private async render(frame: DisplayFrame): Promise<Buffer> {
    const { width, height } = this.options;
    const lineHeight = this.options.lineHeight ?? 20;
    const charWidth = this.options.charWidth ?? 10;
    const textHeight = lineHeight * 3;
    const canvas = new Jimp({ width, height, color: 0x000000ff });

    if (frame.artwork) {
      const art = await Jimp.read(frame.artwork);
      const scale = fitScale(art.bitmap.width, art.bitmap.height, width, height - textHeight);
      if (scale < 1) {
        art.scale(scale);
      }
      const x = Math.floor((width - art.bitmap.width) / 2);
      canvas.composite(art, x, 0);
    }

    const font = await this.loadFont();
    if (font) {
      const maxChars = Math.max(1, Math.floor(width / charWidth));
      const lines = [frame.stationName, frame.title, frame.statusLine];
      lines.forEach((text, index) => {
        canvas.print({
          font,
          x: 0,
          y: height - textHeight + index * lineHeight,
          text: fitText(text, maxChars),
        });
      });
    }

    if (this.options.rotation % 360 !== 0) {
      canvas.rotate(this.options.rotation);
    }
    return canvas.bitmap.data;
  }

  private async loadFont(): Promise<Font | null> {
    if (this.fontLoaded || !this.options.fontPath) {
      return this.font;
    }
    this.fontLoaded = true;
    try {
      this.font = await loadFont(this.options.fontPath);
    } catch (error) {
      this.log.warn('display font not loaded; drawing artwork only', {
        fontPath: this.options.fontPath,
        message: errorMessage(error),
      });
    }
    return this.font;
  }
}
