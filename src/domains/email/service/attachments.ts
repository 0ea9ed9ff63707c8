/**
 * @fileoverview Attachment relevance filter.
 *
 * Separates substantive attachments (invoices, contracts, spreadsheets) from
 * decorative ones (signature images, logos, inline banners). Rules run in
 * order and the first match wins: documents are always kept, images only
 * when their name suggests real content.
 */

import type { EmailAttachment } from '../types.js';

/** MIME types that are never content (inline signature graphics, favicons). */
const DECORATIVE_MIME_TYPES = new Set([
  'image/gif',
  'image/x-icon',
  'image/bmp',
]);

/** Lower-cased filename patterns used for branding and signatures. */
const DECORATIVE_NAME_PATTERNS: RegExp[] = [
  /^image\d*\./, // image001.png, image.gif
  /^logo/,
  /^signature/,
  /^icon/,
  /^banner/,
  /^footer/,
  /^header/,
  /_signature\./,
  /_logo\./,
];

const DOCUMENT_EXTENSIONS = new Set([
  'pdf', 'doc', 'docx', 'xls', 'xlsx', 'csv', 'txt',
  'ppt', 'pptx', 'rtf', 'odt', 'ods', 'zip', 'rar',
]);

/** Words that make an image filename look like a scanned or captured document. */
const MEANINGFUL_IMAGE_WORDS = [
  'invoice',
  'receipt',
  'document',
  'scan',
  'contract',
  'report',
  'screenshot',
];

const MIN_MEANINGFUL_IMAGE_NAME_LENGTH = 10;

/** Default characters of context kept on each side of a content match. */
export const CONTEXT_RADIUS = 100;

/**
 * Lower-cased extension without the dot, or '' when the name has none.
 */
export function fileExtension(filename: string): string {
  const dot = filename.lastIndexOf('.');
  return dot === -1 ? '' : filename.slice(dot + 1).toLowerCase();
}

/**
 * Decide whether an attachment carries content worth searching or showing.
 */
export function isRelevantAttachment(filename: string, mimeType: string): boolean {
  if (!filename) return false;

  const name = filename.toLowerCase();
  const mime = mimeType.toLowerCase();

  if (DECORATIVE_MIME_TYPES.has(mime)) return false;

  if (DECORATIVE_NAME_PATTERNS.some((pattern) => pattern.test(name))) return false;

  if (DOCUMENT_EXTENSIONS.has(fileExtension(name))) return true;

  if (mime.startsWith('image/')) {
    if (name.length < MIN_MEANINGFUL_IMAGE_NAME_LENGTH) return false;
    return MEANINGFUL_IMAGE_WORDS.some((word) => name.includes(word));
  }

  // Unknown types fail open
  return true;
}

/**
 * Attachments of a record that pass the relevance filter.
 */
export function relevantAttachments(attachments: EmailAttachment[]): EmailAttachment[] {
  return attachments.filter((a) => isRelevantAttachment(a.filename, a.mimeType));
}

/**
 * Does the attachment match a file-type filter such as "pdf", ".xlsx" or
 * "spreadsheetml"? Matches the extension exactly or the MIME type by substring.
 */
export function matchesFileType(attachment: EmailAttachment, fileType: string): boolean {
  const wanted = fileType.trim().toLowerCase().replace(/^\./, '');
  if (!wanted) return true;
  return fileExtension(attachment.filename) === wanted
    || attachment.mimeType.toLowerCase().includes(wanted);
}

/**
 * Text around the first case-insensitive occurrence of `phrase`, at most
 * `radius` characters on each side. Cut ends are marked with "...".
 * Returns null when the phrase does not occur.
 */
export function extractContextWindow(
  text: string,
  phrase: string,
  radius = CONTEXT_RADIUS
): string | null {
  const needle = phrase.toLowerCase();
  if (!needle) return null;

  const index = text.toLowerCase().indexOf(needle);
  if (index === -1) return null;

  const start = Math.max(0, index - radius);
  const end = Math.min(text.length, index + needle.length + radius);
  const prefix = start > 0 ? '...' : '';
  const suffix = end < text.length ? '...' : '';
  return `${prefix}${text.slice(start, end)}${suffix}`;
}
