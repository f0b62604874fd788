import { jsPDF } from 'jspdf';

const PAGE_MARGIN = 15;
const HEADER_HEIGHT = 28;
const LINE_HEIGHT = 6;
const primaryColor = '#8a1538';

export type WorksheetDocumentKind = 'worksheet' | 'answer-key';

export function buildWorksheetPdf(title: string, body: string): jsPDF {
  const doc = new jsPDF({ unit: 'mm', format: 'a4' });
  const pageW = doc.internal.pageSize.getWidth();
  const pageH = doc.internal.pageSize.getHeight();
  const maxW = pageW - PAGE_MARGIN * 2;

  doc.setFillColor(primaryColor);
  doc.rect(0, 0, pageW, HEADER_HEIGHT, 'F');
  doc.setTextColor(255, 255, 255);
  doc.setFontSize(16);
  doc.setFont('helvetica', 'bold');
  const titleLines: string[] = doc.splitTextToSize(title, maxW);
  doc.text(titleLines[0] ?? '', PAGE_MARGIN, 18);

  doc.setTextColor(0, 0, 0);
  doc.setFontSize(11);
  doc.setFont('helvetica', 'normal');

  let yPos = HEADER_HEIGHT + 12;

  const addPageIfNeeded = () => {
    if (yPos > pageH - PAGE_MARGIN - LINE_HEIGHT) {
      doc.addPage();
      yPos = PAGE_MARGIN + LINE_HEIGHT;
    }
  };

  body.split(/\r?\n/).forEach(paragraph => {
    if (paragraph.trim() === '') {
      yPos += LINE_HEIGHT / 2;
      return;
    }
    const lines: string[] = doc.splitTextToSize(paragraph, maxW);
    lines.forEach(line => {
      addPageIfNeeded();
      doc.text(line, PAGE_MARGIN, yPos);
      yPos += LINE_HEIGHT;
    });
  });

  const pages = doc.getNumberOfPages();
  doc.setFontSize(8);
  doc.setTextColor(148, 163, 184);
  for (let page = 1; page <= pages; page++) {
    doc.setPage(page);
    doc.text(`Page ${page} of ${pages}`, pageW / 2, pageH - 8, { align: 'center' });
  }

  return doc;
}

export function renderWorksheetPdf(title: string, body: string): Uint8Array {
  return new Uint8Array(buildWorksheetPdf(title, body).output('arraybuffer'));
}

export function worksheetFileName(studentId: string, studentName: string, skill: string, kind: WorksheetDocumentKind): string {
  const safe = (part: string) => part.trim().replace(/[^A-Za-z0-9-]+/g, '_').replace(/^_+|_+$/g, '');
  return `${[studentId, studentName, skill, kind].map(safe).join('_')}.pdf`;
}
