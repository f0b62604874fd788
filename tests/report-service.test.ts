import { describe, expect, it } from 'vitest';
import { buildWorksheetPdf, renderWorksheetPdf, worksheetFileName } from '../services/reportService';

describe('buildWorksheetPdf', () => {
  it('fits a short worksheet on one page', () => {
    const doc = buildWorksheetPdf('Amal - Grammar (Grade 1)', 'PASSAGE:\nThe cat sat on the mat.');
    expect(doc.getNumberOfPages()).toBe(1);
  });

  it('adds pages when the body runs past the bottom margin', () => {
    const body = Array.from({ length: 120 }, (_, i) => `Line ${i + 1}`).join('\n');
    expect(buildWorksheetPdf('Long worksheet', body).getNumberOfPages()).toBe(3);
  });
});

describe('renderWorksheetPdf', () => {
  it('returns PDF bytes', () => {
    const bytes = renderWorksheetPdf('Answer Key', 'ANSWER KEY:\n1) B');
    expect(bytes).toBeInstanceOf(Uint8Array);
    expect(Buffer.from(bytes.subarray(0, 5)).toString('latin1')).toBe('%PDF-');
  });
});

describe('worksheetFileName', () => {
  it('replaces unsafe characters', () => {
    expect(worksheetFileName('7', 'Amal Hassan', 'Reading Comprehension', 'answer-key')).toBe(
      '7_Amal_Hassan_Reading_Comprehension_answer-key.pdf'
    );
    expect(worksheetFileName('12', "O'Neil", 'Grammar', 'worksheet')).toBe('12_O_Neil_Grammar_worksheet.pdf');
  });
});
