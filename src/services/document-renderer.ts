/**
 * PDF Document Renderer
 * One letter-size PDF page per story page. Portrait puts the illustration in
 * the top 60% with the text below; landscape puts a 70%-height illustration
 * on the left and the text on the right.
 */

import { PDFDocument, PageSizes, StandardFonts, type PDFFont, type PDFImage } from 'pdf-lib';
import { logger } from '@/config/logger.js';
import type { DocumentArtifact, PdfOrientation, StoryRecord } from '@/shared/types.js';
import { DocumentRenderError } from '@/workflows/errors.js';
import { artifactKeys, type IArtifactStore } from './storage.js';

export interface IDocumentRenderer {
  render(record: StoryRecord, namespace: string): Promise<DocumentArtifact>;
}

const INCH = 72;
const MARGIN = 0.8 * INCH;
const TEXT_GAP = 0.4 * INCH;
const BODY_SIZE = 12;
const LINE_HEIGHT = 14;
const FOOTER_SIZE = 10;

interface PageLayout {
  width: number;
  height: number;
  image: { x: number; y: number; width: number; height: number };
  text: { x: number; top: number; maxWidth: number };
}

export function computeLayout(orientation: PdfOrientation): PageLayout {
  const [shortSide, longSide] = PageSizes.Letter;
  if (orientation === 'portrait') {
    const width = shortSide;
    const height = longSide;
    const imageHeight = height * 0.6;
    return {
      width,
      height,
      image: { x: MARGIN, y: height - MARGIN - imageHeight, width: width - 2 * MARGIN, height: imageHeight },
      text: { x: MARGIN, top: height - MARGIN - imageHeight - TEXT_GAP, maxWidth: width - 2 * MARGIN },
    };
  }

  const width = longSide;
  const height = shortSide;
  const imageHeight = height * 0.7;
  const imageWidth = (width - 3 * MARGIN) * 0.6;
  const textX = imageWidth + 2 * MARGIN;
  return {
    width,
    height,
    image: { x: MARGIN, y: height - MARGIN - imageHeight, width: imageWidth, height: imageHeight },
    text: { x: textX, top: height - MARGIN - TEXT_GAP, maxWidth: width - textX - MARGIN },
  };
}

/**
 * Standard fonts only encode WinAnsi; map typographic punctuation and drop the rest.
 */
export function toWinAnsi(text: string): string {
  return text
    .replace(/[‘’‚′]/g, "'")
    .replace(/[“”„″]/g, '"')
    .replace(/[–—−]/g, '-')
    .replace(/…/g, '...')
    .replace(/[    ]/g, ' ')
    .replace(/[^\x20-\x7E¡-ÿ\n]/g, '');
}

/**
 * Greedy word wrap by measured width. A word wider than the line stands alone.
 */
export function wrapText(text: string, font: Pick<PDFFont, 'widthOfTextAtSize'>, size: number, maxWidth: number): string[] {
  const lines: string[] = [];
  for (const paragraph of text.split(/\n+/)) {
    let current = '';
    for (const word of paragraph.split(/\s+/).filter((w) => w.length > 0)) {
      const candidate = current ? `${current} ${word}` : word;
      if (!current || font.widthOfTextAtSize(candidate, size) <= maxWidth) {
        current = candidate;
      } else {
        lines.push(current);
        current = word;
      }
    }
    if (current) lines.push(current);
  }
  return lines;
}

export class PdfDocumentRenderer implements IDocumentRenderer {
  constructor(
    private readonly store: IArtifactStore,
    private readonly config: { orientation: PdfOrientation },
  ) {}

  async render(record: StoryRecord, namespace: string): Promise<DocumentArtifact> {
    let bytes: Uint8Array;
    try {
      bytes = await this.build(record);
    } catch (error) {
      if (error instanceof DocumentRenderError) throw error;
      throw new DocumentRenderError(error instanceof Error ? error.message : String(error), error);
    }

    const stored = await this.store.put(namespace, artifactKeys.document(), Buffer.from(bytes), 'application/pdf');
    logger.info('Storybook PDF written', {
      projectId: record.projectId,
      id: stored.id,
      pages: record.pages.length,
      size: stored.byteLength,
      orientation: this.config.orientation,
    });

    return {
      id: stored.id,
      uri: stored.uri,
      pageCount: record.pages.length,
      byteLength: stored.byteLength,
      orientation: this.config.orientation,
    };
  }

  async build(record: StoryRecord): Promise<Uint8Array> {
    if (!record.pages.length) {
      throw new DocumentRenderError('at least one page is required');
    }

    const layout = computeLayout(this.config.orientation);
    const pdfDoc = await PDFDocument.create();
    pdfDoc.setTitle(toWinAnsi(record.title));
    pdfDoc.setCreator('picture-book-workflow');
    const font = await pdfDoc.embedFont(StandardFonts.TimesRoman);

    for (const [position, storyPage] of record.pages.entries()) {
      const page = pdfDoc.addPage([layout.width, layout.height]);
      const image = storyPage.render.image;
      if (!image) {
        throw new DocumentRenderError(`page ${storyPage.outline.index} has no image`);
      }

      const embedded = await this.embedImage(pdfDoc, image.mimeType, await this.store.get(image.id));
      // Fit inside the image box, anchored to its top edge
      const scale = Math.min(layout.image.width / embedded.width, layout.image.height / embedded.height);
      const drawWidth = embedded.width * scale;
      const drawHeight = embedded.height * scale;
      page.drawImage(embedded, {
        x: layout.image.x + (layout.image.width - drawWidth) / 2,
        y: layout.image.y + layout.image.height - drawHeight,
        width: drawWidth,
        height: drawHeight,
      });

      let y = layout.text.top;
      for (const line of wrapText(toWinAnsi(storyPage.outline.text), font, BODY_SIZE, layout.text.maxWidth)) {
        if (y <= MARGIN) break;
        page.drawText(line, { x: layout.text.x, y, size: BODY_SIZE, font });
        y -= LINE_HEIGHT;
      }

      page.drawText(`Page ${position + 1}`, {
        x: layout.width - MARGIN - 30,
        y: MARGIN - 10,
        size: FOOTER_SIZE,
        font,
      });
    }

    return pdfDoc.save();
  }

  private async embedImage(pdfDoc: PDFDocument, mimeType: string, data: Buffer): Promise<PDFImage> {
    switch (mimeType) {
      case 'image/png':
        return pdfDoc.embedPng(data);
      case 'image/jpeg':
      case 'image/jpg':
        return pdfDoc.embedJpg(data);
      default:
        throw new DocumentRenderError(`unsupported image type ${mimeType}`);
    }
  }
}
