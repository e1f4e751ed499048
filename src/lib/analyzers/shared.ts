import { CATEGORY_LABELS, CATEGORY_WEIGHTS, type CategoryName, type CategoryResult, HEADING_TAGS, type PageImage, type PageScript, type ParsedPage, type StructuredDataBlock, getGrade } from '../types';
import { IssueLedger } from './issue-ledger';

const LEGACY_IMAGE_EXTENSIONS = new Set(['jpg', 'jpeg', 'png', 'gif', 'bmp']);

export function buildCategoryResult<N extends CategoryName>(
  name: N,
  ledger: IssueLedger,
  summarize: (score: number, issueCount: number) => string
): CategoryResult & { name: N } {
  const score = ledger.finalScore();
  const issues = ledger.issues();
  return {
    name,
    label: CATEGORY_LABELS[name],
    score,
    grade: getGrade(score),
    weight: CATEGORY_WEIGHTS[name],
    issues,
    summary: summarize(score, issues.length),
  };
}

/** Rounds to the nearest integer, sending exact halves to the even neighbour (2.5 -> 2, 3.5 -> 4). */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const fraction = value - floor;
  if (fraction < 0.5) return floor;
  if (fraction > 0.5) return floor + 1;
  return floor % 2 === 0 ? floor : floor + 1;
}

export function imageExtension(src: string): string {
  const lower = src.toLowerCase();
  const dot = lower.lastIndexOf('.');
  return dot === -1 ? '' : lower.slice(dot + 1);
}

export function countLegacyImages(images: PageImage[]): number {
  return images.filter(img => LEGACY_IMAGE_EXTENSIONS.has(imageExtension(img.src))).length;
}

export function imagesWithoutDimensions(images: PageImage[]): PageImage[] {
  return images.filter(img => !img.width || !img.height);
}

export function renderBlockingScripts(scripts: PageScript[]): PageScript[] {
  return scripts.filter(s => !s.async && !s.defer);
}

export function allHeadings(parsed: ParsedPage): string[] {
  return HEADING_TAGS.flatMap(tag => parsed.headings[tag]);
}

export function headingCount(parsed: ParsedPage): number {
  return allHeadings(parsed).length;
}

export function schemaType(block: StructuredDataBlock): string | null {
  const type = block['@type'];
  if (Array.isArray(type)) return typeof type[0] === 'string' ? type[0] : null;
  return typeof type === 'string' && type ? type : null;
}

export function hasDateSignal(schema: StructuredDataBlock[]): boolean {
  return schema.some(block => Boolean(block.datePublished) || Boolean(block.dateModified));
}
