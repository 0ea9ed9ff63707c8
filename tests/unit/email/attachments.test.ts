import { describe, expect, it } from 'vitest';
import {
  extractContextWindow,
  fileExtension,
  isRelevantAttachment,
  matchesFileType,
  relevantAttachments,
} from '../../../src/domains/email/service/attachments.js';
import { makeAttachment } from '../../fixtures/emails.js';

describe('isRelevantAttachment', () => {
  it('rejects attachments without a filename', () => {
    expect(isRelevantAttachment('', 'application/pdf')).toBe(false);
  });

  it('rejects decorative MIME types whatever the name', () => {
    expect(isRelevantAttachment('invoice_scan.gif', 'image/gif')).toBe(false);
    expect(isRelevantAttachment('favicon.ico', 'image/x-icon')).toBe(false);
    expect(isRelevantAttachment('report.bmp', 'IMAGE/BMP')).toBe(false);
  });

  it.each([
    'image001.png',
    'image.jpg',
    'Logo.png',
    'signature.jpg',
    'icon-small.png',
    'banner_2024.png',
    'footer.png',
    'header.jpg',
    'john_signature.png',
    'company_logo.png',
    'logo.pdf',
  ])('rejects decorative name %s', (filename) => {
    expect(isRelevantAttachment(filename, 'image/png')).toBe(false);
  });

  it('keeps documents by extension', () => {
    expect(isRelevantAttachment('contract.pdf', 'application/pdf')).toBe(true);
    expect(isRelevantAttachment('Invoice_2024.pdf', 'application/pdf')).toBe(true);
    expect(isRelevantAttachment('Q1 Figures.XLSX', 'application/octet-stream')).toBe(true);
    expect(isRelevantAttachment('a.csv', 'text/csv')).toBe(true);
  });

  it('keeps images only when the name suggests content', () => {
    expect(isRelevantAttachment('invoice_march.png', 'image/png')).toBe(true);
    expect(isRelevantAttachment('scan_report.png', 'image/png')).toBe(true);
    expect(isRelevantAttachment('screenshot1.jpg', 'image/jpeg')).toBe(true);
    expect(isRelevantAttachment('photo_beach.jpg', 'image/jpeg')).toBe(false);
    // Contains "scan" but shorter than ten characters
    expect(isRelevantAttachment('scan.png', 'image/png')).toBe(false);
  });

  it('keeps unknown types', () => {
    expect(isRelevantAttachment('notes.md', 'text/markdown')).toBe(true);
    expect(isRelevantAttachment('archive', 'application/octet-stream')).toBe(true);
  });
});

describe('relevantAttachments', () => {
  it('filters a record attachment list', () => {
    const logo = makeAttachment({ filename: 'logo.png', mimeType: 'image/png' });
    const contract = makeAttachment({ filename: 'contract.pdf' });
    expect(relevantAttachments([logo, contract])).toEqual([contract]);
  });
});

describe('fileExtension and matchesFileType', () => {
  it('extracts lower-cased extensions', () => {
    expect(fileExtension('Report.Final.PDF')).toBe('pdf');
    expect(fileExtension('README')).toBe('');
  });

  it('matches by extension or MIME fragment', () => {
    const sheet = makeAttachment({
      filename: 'budget.xlsx',
      mimeType: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
    });
    expect(matchesFileType(sheet, 'xlsx')).toBe(true);
    expect(matchesFileType(sheet, '.XLSX')).toBe(true);
    expect(matchesFileType(sheet, 'spreadsheetml')).toBe(true);
    expect(matchesFileType(sheet, 'pdf')).toBe(false);
  });
});

describe('extractContextWindow', () => {
  it('returns the surrounding text with ellipses on cut ends', () => {
    const text = `${'a'.repeat(150)}Payment terms: NET 30 days${'b'.repeat(150)}`;
    const window = extractContextWindow(text, 'net 30', 10);
    expect(window).toBe('...nt terms: NET 30 daysbbbbb...');
  });

  it('omits ellipses when the window reaches the text edges', () => {
    expect(extractContextWindow('Terms are net 30.', 'net 30')).toBe('Terms are net 30.');
  });

  it('returns null when the phrase is absent or empty', () => {
    expect(extractContextWindow('nothing here', 'invoice')).toBeNull();
    expect(extractContextWindow('nothing here', '')).toBeNull();
  });
});
