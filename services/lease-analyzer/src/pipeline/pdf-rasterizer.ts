import { createRequire } from "node:module";
import { dirname, join, sep } from "node:path";
import { pathToFileURL } from "node:url";

import { Injectable, Logger } from "@nestjs/common";
import { DOMMatrix, ImageData, Path2D, createCanvas, type Canvas, type SKRSContext2D } from "@napi-rs/canvas";
import type { PDFDocumentProxy } from "pdfjs-dist/legacy/build/pdf.mjs";

import { TransformError } from "../errors.js";
import type { Page, PageAsset, SourceDocument } from "../types.js";

export const RASTER_DPI = 200;
const PDF_POINTS_PER_INCH = 72;

const moduleRequire = createRequire(import.meta.url);

interface CanvasAndContext {
  canvas: Canvas | null;
  context: SKRSContext2D | null;
}

/** pdf.js allocates its scratch canvases (patterns, masks) through this. */
class NapiCanvasFactory {
  create(width: number, height: number): CanvasAndContext {
    if (width <= 0 || height <= 0) {
      throw new Error("Invalid canvas size");
    }
    const canvas = createCanvas(Math.max(1, Math.round(width)), Math.max(1, Math.round(height)));
    return { canvas, context: canvas.getContext("2d") };
  }

  reset(target: CanvasAndContext, width: number, height: number): void {
    if (!target.canvas) {
      throw new Error("Canvas is not specified");
    }
    target.canvas.width = Math.max(1, Math.round(width));
    target.canvas.height = Math.max(1, Math.round(height));
  }

  destroy(target: CanvasAndContext): void {
    if (target.canvas) {
      target.canvas.width = 0;
      target.canvas.height = 0;
    }
    target.canvas = null;
    target.context = null;
  }
}

type PdfJs = typeof import("pdfjs-dist/legacy/build/pdf.mjs");

let pdfjsModule: Promise<PdfJs> | undefined;

function loadPdfJs(): Promise<PdfJs> {
  pdfjsModule ??= (async () => {
    // pdf.js looks these up on the global scope when it renders under Node.
    Object.assign(globalThis, { DOMMatrix, ImageData, Path2D });
    const pdfjs = await import("pdfjs-dist/legacy/build/pdf.mjs");
    pdfjs.GlobalWorkerOptions.workerSrc = pathToFileURL(
      moduleRequire.resolve("pdfjs-dist/legacy/build/pdf.worker.mjs"),
    ).toString();
    return pdfjs;
  })();
  return pdfjsModule;
}

function standardFontDataUrl(): string {
  return join(dirname(moduleRequire.resolve("pdfjs-dist/package.json")), "standard_fonts") + sep;
}

@Injectable()
export class PdfRasterizer {
  private readonly logger = new Logger(PdfRasterizer.name);

  /** Renders pages 1..N of the document to PNG, in page order. */
  async rasterize(document: SourceDocument): Promise<Page[]> {
    const pdfjs = await loadPdfJs();
    let pdf: PDFDocumentProxy | undefined;
    try {
      pdf = await pdfjs.getDocument({
        data: new Uint8Array(document.bytes),
        CanvasFactory: NapiCanvasFactory,
        standardFontDataUrl: standardFontDataUrl(),
        isEvalSupported: false,
        disableFontFace: true,
        verbosity: pdfjs.VerbosityLevel.ERRORS,
      }).promise;

      if (pdf.numPages === 0) {
        throw new Error("document has no pages");
      }

      const factory = new NapiCanvasFactory();
      const scale = RASTER_DPI / PDF_POINTS_PER_INCH;
      const pages: Page[] = [];
      for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber += 1) {
        const page = await pdf.getPage(pageNumber);
        const viewport = page.getViewport({ scale });
        const target = factory.create(viewport.width, viewport.height);
        const { canvas, context } = target;
        if (!canvas || !context) {
          throw new Error(`could not allocate a canvas for page ${pageNumber}`);
        }
        try {
          await page.render({ canvasContext: context, viewport }).promise;
          pages.push({
            documentIndex: document.index,
            pageIndex: pageNumber - 1,
            pageNumber,
            raster: canvas.toBuffer("image/png"),
          });
        } finally {
          factory.destroy(target);
          page.cleanup();
        }
      }

      this.logger.log(`Rasterized ${document.filename}: ${pages.length} page(s) at ${RASTER_DPI} DPI`);
      return pages;
    } catch (error) {
      throw new TransformError(document.filename, error);
    } finally {
      await pdf?.destroy();
    }
  }

  async toAssets(document: SourceDocument): Promise<PageAsset[]> {
    const pages = await this.rasterize(document);
    return pages.map((page) => ({
      kind: "page",
      documentIndex: page.documentIndex,
      pageIndex: page.pageIndex,
      filename: document.filename,
      bytes: page.raster,
    }));
  }
}
