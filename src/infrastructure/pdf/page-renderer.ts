import { createCanvas, DOMMatrix, ImageData, Path2D, type Canvas, type SKRSContext2D } from '@napi-rs/canvas';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../../domain/errors.js';
import { logger } from '../logger.js';
import { withPdf } from './document.js';
import type { PageRenderer } from './types.js';

const log = logger.child({ module: 'pdf-page-renderer' });

const PDF_POINTS_PER_INCH = 72;
const JPEG_QUALITY = 90;

interface CanvasAndContext {
  canvas: Canvas;
  context: SKRSContext2D;
}

/** Scratch canvases pdf.js allocates while painting images and patterns. */
class NapiCanvasFactory {
  create(width: number, height: number): CanvasAndContext {
    const canvas = createCanvas(Math.max(1, Math.ceil(width)), Math.max(1, Math.ceil(height)));
    return { canvas, context: canvas.getContext('2d') };
  }

  reset(target: CanvasAndContext, width: number, height: number): void {
    target.canvas.width = Math.max(1, Math.ceil(width));
    target.canvas.height = Math.max(1, Math.ceil(height));
  }

  destroy(target: CanvasAndContext): void {
    target.canvas.width = 0;
    target.canvas.height = 0;
  }
}

let globalsInstalled = false;

/** pdf.js paints through DOM canvas classes that Node does not provide. */
function installCanvasGlobals(): void {
  if (globalsInstalled) return;
  for (const [name, impl] of Object.entries({ DOMMatrix, ImageData, Path2D })) {
    if (!(name in globalThis)) {
      Reflect.set(globalThis, name, impl);
    }
  }
  globalsInstalled = true;
}

export class PdfjsPageRenderer implements PageRenderer {
  async renderFirstPage(path: string, dpi: number): Promise<Result<Buffer, AppError>> {
    installCanvasGlobals();

    try {
      const image = await withPdf(
        path,
        async (pdf) => {
          const page = await pdf.getPage(1);
          const viewport = page.getViewport({ scale: dpi / PDF_POINTS_PER_INCH });
          const { canvas, context } = new NapiCanvasFactory().create(viewport.width, viewport.height);

          context.fillStyle = '#ffffff';
          context.fillRect(0, 0, canvas.width, canvas.height);
          await page.render({ canvasContext: context, viewport }).promise;

          return canvas.encode('jpeg', JPEG_QUALITY);
        },
        { CanvasFactory: NapiCanvasFactory },
      );

      log.debug({ path, dpi, sizeBytes: image.length }, 'First page rendered');
      return ok(image);
    } catch (cause) {
      const details = cause instanceof Error ? cause.message : String(cause);
      log.warn({ path, dpi, errorCode: ErrorCode.RENDER_FAILED, details }, 'Failed to render first page');
      return err(createAppError(ErrorCode.RENDER_FAILED, 'Failed to render first page', false, details));
    }
  }
}
