/**
 * PDF reports for inspection records, built with pdf-lib.
 *
 *   renderSingle   one page for one record
 *   renderBatch    one page per record, optional cover page
 *   renderSummary  status totals plus a table of every record
 *
 * A missing or unreadable photo never aborts a render: the photo slot says
 * "Photo unavailable" and the problem is returned in `errors`.
 */
import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { PDFDocument, StandardFonts, rgb, type PDFFont, type PDFImage, type PDFPage } from 'pdf-lib';
import { format } from 'date-fns';
import type { InspectionRecord, InspectionStatus, StatusCounts } from '../types/inspection';
import { formatDisplayDate } from './dateValidator';
import { RenderError, errorMessage } from './errors';
import { STATUS_LABELS, countBy, countByStatus } from './inspectionHelpers';
import { systemClock, type Clock } from './time';

// A4 in points
const PAGE_WIDTH = 595.28;
const PAGE_HEIGHT = 841.89;

const MARGIN = 50;
const CONTENT_WIDTH = PAGE_WIDTH - MARGIN * 2;
const CONTENT_BOTTOM = MARGIN + 30;

const FONT_SIZE_TITLE = 18;
const FONT_SIZE_HEADING = 12;
const FONT_SIZE_BODY = 10;
const FONT_SIZE_SMALL = 8;
const LINE_HEIGHT = 1.4;

const PHOTO_BOX_WIDTH = 190;
const PHOTO_BOX_HEIGHT = 140;
const MAX_NOTE_LINES = 6;

type Colour = ReturnType<typeof rgb>;

const COLOUR_BLACK = rgb(0, 0, 0);
const COLOUR_MID_GREY = rgb(0.5, 0.5, 0.5);
const COLOUR_LIGHT_GREY = rgb(0.9, 0.9, 0.9);
const COLOUR_WHITE = rgb(1, 1, 1);
const COLOUR_HEADER_BG = rgb(0.12, 0.2, 0.4);
const COLOUR_TABLE_HEAD = rgb(0.45, 0.45, 0.45);

const STATUS_COLOURS: Record<InspectionStatus, Colour> = {
  OK: rgb(0.13, 0.6, 0.3),
  DUE_SOON: rgb(0.9, 0.6, 0.05),
  OVERDUE: rgb(0.85, 0.2, 0.2),
};

const APP_NAME = 'Equipment Inspection System';

export interface ReportOptions {
  clock?: Clock;
  title?: string;
}

export interface BatchOptions extends ReportOptions {
  coverPage?: boolean;
}

export interface RenderResult {
  bytes: Uint8Array;
  pageCount: number;
  errors: RenderError[];
}

export interface SummaryResult extends RenderResult {
  counts: StatusCounts;
}

interface Fonts {
  regular: PDFFont;
  bold: PDFFont;
}

interface Ctx {
  doc: PDFDocument;
  fonts: Fonts;
  generatedAt: Date;
  errors: RenderError[];
}

// --- text helpers ---

// Standard fonts only encode WinAnsi; anything else becomes '?'
const WIN_ANSI_EXTRAS = new Set('€‚ƒ„…†‡ˆ‰Š‹ŒŽ‘’“”•–—˜™š›œžŸ');

export function toWinAnsi(text: string): string {
  let out = '';
  for (const ch of text.replace(/\t/g, ' ')) {
    const code = ch.codePointAt(0) ?? 0;
    const printable = (code >= 0x20 && code <= 0x7e) || (code >= 0xa0 && code <= 0xff) || WIN_ANSI_EXTRAS.has(ch);
    out += printable ? ch : '?';
  }
  return out;
}

export function wrapText(text: string, font: PDFFont, size: number, maxWidth: number): string[] {
  const lines: string[] = [];
  for (const paragraph of text.split(/\r?\n/)) {
    const words = toWinAnsi(paragraph).split(' ').filter(Boolean);
    let line = '';
    for (const word of words) {
      const candidate = line ? `${line} ${word}` : word;
      if (font.widthOfTextAtSize(candidate, size) <= maxWidth || !line) {
        line = candidate;
      } else {
        lines.push(line);
        line = word;
      }
    }
    lines.push(line);
  }
  return lines;
}

function drawLine(page: PDFPage, text: string, x: number, y: number, font: PDFFont, size: number, color: Colour = COLOUR_BLACK) {
  page.drawText(toWinAnsi(text), { x, y, size, font, color });
}

function valueOr(value: string | number | null | undefined, fallback = 'N/A') {
  return value === null || value === undefined || value === '' ? fallback : String(value);
}

// --- building blocks ---

async function createContext(clock: Clock): Promise<Ctx> {
  const doc = await PDFDocument.create();
  doc.setProducer(APP_NAME);
  doc.setCreator(APP_NAME);
  const generatedAt = clock();
  doc.setCreationDate(generatedAt);
  const [regular, bold] = await Promise.all([doc.embedFont(StandardFonts.Helvetica), doc.embedFont(StandardFonts.HelveticaBold)]);
  return { doc, fonts: { regular, bold }, generatedAt, errors: [] };
}

function addPage(ctx: Ctx): PDFPage {
  return ctx.doc.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
}

function drawHeader(ctx: Ctx, page: PDFPage, title: string, subtitle?: string): number {
  const height = subtitle ? 56 : 40;
  page.drawRectangle({ x: 0, y: PAGE_HEIGHT - height, width: PAGE_WIDTH, height, color: COLOUR_HEADER_BG });
  drawLine(page, title, MARGIN, PAGE_HEIGHT - 26, ctx.fonts.bold, FONT_SIZE_TITLE, COLOUR_WHITE);
  if (subtitle) drawLine(page, subtitle, MARGIN, PAGE_HEIGHT - 44, ctx.fonts.regular, FONT_SIZE_BODY, COLOUR_WHITE);
  return PAGE_HEIGHT - height - 24;
}

function drawSectionTitle(ctx: Ctx, page: PDFPage, title: string, y: number): number {
  drawLine(page, title, MARGIN, y, ctx.fonts.bold, FONT_SIZE_HEADING);
  page.drawLine({ start: { x: MARGIN, y: y - 4 }, end: { x: MARGIN + CONTENT_WIDTH, y: y - 4 }, thickness: 0.5, color: COLOUR_MID_GREY });
  return y - FONT_SIZE_HEADING * LINE_HEIGHT - 4;
}

// Two-column label/value table
function drawFieldTable(ctx: Ctx, page: PDFPage, rows: [string, string][], y: number, labelWidth = 150): number {
  const rowHeight = FONT_SIZE_BODY * LINE_HEIGHT + 6;
  rows.forEach(([label, value], i) => {
    const top = y - i * rowHeight;
    if (i % 2 === 0) {
      page.drawRectangle({ x: MARGIN, y: top - rowHeight + 4, width: CONTENT_WIDTH, height: rowHeight, color: COLOUR_LIGHT_GREY });
    }
    drawLine(page, label, MARGIN + 6, top - FONT_SIZE_BODY, ctx.fonts.bold, FONT_SIZE_BODY);
    drawLine(page, value, MARGIN + labelWidth, top - FONT_SIZE_BODY, ctx.fonts.regular, FONT_SIZE_BODY);
  });
  return y - rows.length * rowHeight - 12;
}

function drawStatusBadge(ctx: Ctx, page: PDFPage, status: InspectionStatus, x: number, y: number) {
  const label = STATUS_LABELS[status].toUpperCase();
  const width = ctx.fonts.bold.widthOfTextAtSize(label, FONT_SIZE_BODY) + 16;
  page.drawRectangle({ x, y: y - 5, width, height: FONT_SIZE_BODY + 9, color: STATUS_COLOURS[status] });
  drawLine(page, label, x + 8, y, ctx.fonts.bold, FONT_SIZE_BODY, COLOUR_WHITE);
}

async function loadPhoto(ctx: Ctx, record: InspectionRecord): Promise<PDFImage | null> {
  if (!record.photoPath) return null;
  try {
    const bytes = await readFile(record.photoPath);
    const ext = extname(record.photoPath).toLowerCase();
    return ext === '.png' ? await ctx.doc.embedPng(bytes) : await ctx.doc.embedJpg(bytes);
  } catch (e) {
    const error = new RenderError(
      `Photo for inspection ${record.id} is unavailable: ${errorMessage(e)}`,
      { recordId: record.id, path: record.photoPath },
      e,
    );
    console.warn('reportGenerator.loadPhoto failed', record.id, record.photoPath, e);
    ctx.errors.push(error);
    return null;
  }
}

function drawPhotoSlot(ctx: Ctx, page: PDFPage, record: InspectionRecord, image: PDFImage | null, y: number): number {
  page.drawRectangle({
    x: MARGIN,
    y: y - PHOTO_BOX_HEIGHT,
    width: PHOTO_BOX_WIDTH,
    height: PHOTO_BOX_HEIGHT,
    borderColor: COLOUR_MID_GREY,
    borderWidth: 0.5,
  });
  if (image) {
    const scaled = image.scaleToFit(PHOTO_BOX_WIDTH - 8, PHOTO_BOX_HEIGHT - 8);
    page.drawImage(image, {
      x: MARGIN + (PHOTO_BOX_WIDTH - scaled.width) / 2,
      y: y - PHOTO_BOX_HEIGHT + (PHOTO_BOX_HEIGHT - scaled.height) / 2,
      width: scaled.width,
      height: scaled.height,
    });
  } else {
    const text = record.photoPath ? 'Photo unavailable' : 'No photo attached';
    const width = ctx.fonts.regular.widthOfTextAtSize(text, FONT_SIZE_BODY);
    drawLine(page, text, MARGIN + (PHOTO_BOX_WIDTH - width) / 2, y - PHOTO_BOX_HEIGHT / 2, ctx.fonts.regular, FONT_SIZE_BODY, COLOUR_MID_GREY);
  }
  return y - PHOTO_BOX_HEIGHT - 16;
}

async function drawRecordPage(ctx: Ctx, record: InspectionRecord, title: string) {
  const image = await loadPhoto(ctx, record);
  const page = addPage(ctx);
  let y = drawHeader(ctx, page, title, `${record.tag}  |  Inspection #${record.id}`);

  y = drawSectionTitle(ctx, page, 'Equipment', y);
  y = drawFieldTable(ctx, page, [
    ['Platform', record.platform],
    ['Module', record.module],
    ['Sector', record.sector],
    ['Equipment type', record.equipmentType],
    ['TAG', record.tag],
  ], y);

  y = drawSectionTitle(ctx, page, 'Dates and status', y);
  y = drawFieldTable(ctx, page, [
    ['Inspection date', formatDisplayDate(record.inspectionDate)],
    ['Next inspection', formatDisplayDate(record.nextInspectionDate)],
    ['Days until due', String(record.daysUntilDue)],
  ], y);
  drawLine(page, 'Status', MARGIN + 6, y, ctx.fonts.bold, FONT_SIZE_BODY);
  drawStatusBadge(ctx, page, record.status, MARGIN + 150, y);
  y -= FONT_SIZE_BODY * LINE_HEIGHT + 18;

  const defects: [string, string][] = [
    ['Defect', valueOr(record.defect)],
    ['Cause', valueOr(record.cause)],
    ['RTI category', valueOr(record.rtiCategory)],
    ['Recommendation', valueOr(record.recommendation)],
    ['Damage type', valueOr(record.damageType)],
  ];
  if (defects.some(([, v]) => v !== 'N/A')) {
    y = drawSectionTitle(ctx, page, 'Findings', y);
    y = drawFieldTable(ctx, page, defects, y);
  }

  if (record.notes.trim()) {
    y = drawSectionTitle(ctx, page, 'Notes', y);
    const lines = wrapText(record.notes, ctx.fonts.regular, FONT_SIZE_BODY, CONTENT_WIDTH);
    const shown = lines.length > MAX_NOTE_LINES ? [...lines.slice(0, MAX_NOTE_LINES - 1), `${lines[MAX_NOTE_LINES - 1]} …`] : lines;
    for (const line of shown) {
      drawLine(page, line, MARGIN, y, ctx.fonts.regular, FONT_SIZE_BODY);
      y -= FONT_SIZE_BODY * LINE_HEIGHT;
    }
    y -= 10;
  }

  y = drawSectionTitle(ctx, page, 'Photo', y);
  drawPhotoSlot(ctx, page, record, image, y);
}

function drawFooters(ctx: Ctx) {
  const pages = ctx.doc.getPages();
  const stamp = `Generated ${format(ctx.generatedAt, 'dd/MM/yyyy HH:mm:ss')}  |  ${APP_NAME}`;
  pages.forEach((page, i) => {
    page.drawLine({ start: { x: MARGIN, y: MARGIN + 12 }, end: { x: MARGIN + CONTENT_WIDTH, y: MARGIN + 12 }, thickness: 0.5, color: COLOUR_MID_GREY });
    drawLine(page, stamp, MARGIN, MARGIN, ctx.fonts.regular, FONT_SIZE_SMALL, COLOUR_MID_GREY);
    const label = `Page ${i + 1} of ${pages.length}`;
    const width = ctx.fonts.regular.widthOfTextAtSize(label, FONT_SIZE_SMALL);
    drawLine(page, label, MARGIN + CONTENT_WIDTH - width, MARGIN, ctx.fonts.regular, FONT_SIZE_SMALL, COLOUR_MID_GREY);
  });
}

async function finish(ctx: Ctx): Promise<RenderResult> {
  drawFooters(ctx);
  const bytes = await ctx.doc.save();
  return { bytes, pageCount: ctx.doc.getPageCount(), errors: ctx.errors };
}

async function guarded<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (e) {
    if (e instanceof RenderError) throw e;
    console.warn(`reportGenerator.${operation} failed`, e);
    throw new RenderError(`Could not render ${operation}: ${errorMessage(e)}`, {}, e);
  }
}

// --- public API ---

export function renderSingle(record: InspectionRecord, options: ReportOptions = {}): Promise<RenderResult> {
  return guarded('single report', async () => {
    const ctx = await createContext(options.clock ?? systemClock);
    ctx.doc.setTitle(`Inspection ${record.tag}`);
    await drawRecordPage(ctx, record, options.title ?? 'EQUIPMENT INSPECTION REPORT');
    return finish(ctx);
  });
}

export function renderBatch(records: readonly InspectionRecord[], options: BatchOptions = {}): Promise<RenderResult> {
  return guarded('batch report', async () => {
    const ctx = await createContext(options.clock ?? systemClock);
    ctx.doc.setTitle('Inspection reports');
    if (options.coverPage || records.length === 0) {
      drawCoverPage(ctx, records, options.title ?? 'INSPECTION REPORTS');
    }
    for (const record of records) {
      await drawRecordPage(ctx, record, 'EQUIPMENT INSPECTION REPORT');
    }
    return finish(ctx);
  });
}

function drawCoverPage(ctx: Ctx, records: readonly InspectionRecord[], title: string) {
  const page = addPage(ctx);
  let y = drawHeader(ctx, page, title, `${records.length} inspection record(s)`);
  const counts = countByStatus(records);
  y = drawSectionTitle(ctx, page, 'Contents', y);
  y = drawFieldTable(ctx, page, [
    ['Records', String(counts.total)],
    [STATUS_LABELS.OVERDUE, String(counts.OVERDUE)],
    [STATUS_LABELS.DUE_SOON, String(counts.DUE_SOON)],
    [STATUS_LABELS.OK, String(counts.OK)],
  ], y);
  if (records.length === 0) {
    drawLine(page, 'No inspection records selected.', MARGIN, y, ctx.fonts.regular, FONT_SIZE_BODY, COLOUR_MID_GREY);
  }
}

const SUMMARY_COLUMNS: { header: string; width: number; value: (r: InspectionRecord) => string }[] = [
  { header: 'ID', width: 35, value: (r) => String(r.id) },
  { header: 'TAG', width: 130, value: (r) => r.tag },
  { header: 'Type', width: 100, value: (r) => r.equipmentType },
  { header: 'Inspected', width: 70, value: (r) => formatDisplayDate(r.inspectionDate) },
  { header: 'Next due', width: 70, value: (r) => formatDisplayDate(r.nextInspectionDate) },
  { header: 'Status', width: 90, value: (r) => STATUS_LABELS[r.status] },
];

export function renderSummary(records: readonly InspectionRecord[], options: ReportOptions = {}): Promise<SummaryResult> {
  return guarded('summary report', async () => {
    const ctx = await createContext(options.clock ?? systemClock);
    ctx.doc.setTitle('Inspection summary');
    const counts = countByStatus(records);
    const title = options.title ?? 'INSPECTION SUMMARY';

    let page = addPage(ctx);
    let y = drawHeader(ctx, page, title, `${counts.total} inspection record(s)`);
    y = drawSectionTitle(ctx, page, 'Totals by status', y);
    y = drawFieldTable(ctx, page, [
      ['Total', String(counts.total)],
      [STATUS_LABELS.OVERDUE, String(counts.OVERDUE)],
      [STATUS_LABELS.DUE_SOON, String(counts.DUE_SOON)],
      [STATUS_LABELS.OK, String(counts.OK)],
    ], y);

    const byType = countBy(records, 'equipmentType').map(([k, n]): [string, string] => [k, String(n)]);
    const byPlatform = countBy(records, 'platform').map(([k, n]): [string, string] => [k, String(n)]);
    if (byType.length) {
      y = drawSectionTitle(ctx, page, 'By equipment type', y);
      y = drawFieldTable(ctx, page, byType, y);
    }
    if (byPlatform.length) {
      y = drawSectionTitle(ctx, page, 'By platform', y);
      y = drawFieldTable(ctx, page, byPlatform, y);
    }

    y = drawSectionTitle(ctx, page, 'Records', y);
    const rowHeight = FONT_SIZE_SMALL * LINE_HEIGHT + 6;
    const drawTableHead = (p: PDFPage, top: number) => {
      p.drawRectangle({ x: MARGIN, y: top - rowHeight + 4, width: CONTENT_WIDTH, height: rowHeight, color: COLOUR_TABLE_HEAD });
      let x = MARGIN + 4;
      for (const col of SUMMARY_COLUMNS) {
        drawLine(p, col.header, x, top - FONT_SIZE_SMALL - 1, ctx.fonts.bold, FONT_SIZE_SMALL, COLOUR_WHITE);
        x += col.width;
      }
      return top - rowHeight;
    };

    if (y - rowHeight * 2 < CONTENT_BOTTOM) {
      page = addPage(ctx);
      y = drawHeader(ctx, page, `${title} (continued)`);
    }
    y = drawTableHead(page, y);
    for (const [i, record] of records.entries()) {
      if (y - rowHeight < CONTENT_BOTTOM) {
        page = addPage(ctx);
        y = drawTableHead(page, drawHeader(ctx, page, `${title} (continued)`));
      }
      if (i % 2 === 1) {
        page.drawRectangle({ x: MARGIN, y: y - rowHeight + 4, width: CONTENT_WIDTH, height: rowHeight, color: COLOUR_LIGHT_GREY });
      }
      let x = MARGIN + 4;
      for (const col of SUMMARY_COLUMNS) {
        const colour = col.header === 'Status' ? STATUS_COLOURS[record.status] : COLOUR_BLACK;
        const font = col.header === 'Status' ? ctx.fonts.bold : ctx.fonts.regular;
        drawLine(page, col.value(record), x, y - FONT_SIZE_SMALL - 1, font, FONT_SIZE_SMALL, colour);
        x += col.width;
      }
      y -= rowHeight;
    }

    return { ...(await finish(ctx)), counts };
  });
}
