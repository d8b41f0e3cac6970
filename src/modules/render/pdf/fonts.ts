import { StandardFonts, type PDFDocument, type PDFFont } from 'pdf-lib';

export type FontSet = {
  regular: PDFFont;
  bold: PDFFont;
};

export async function embedFonts(pdf: PDFDocument): Promise<FontSet> {
  return {
    regular: await pdf.embedFont(StandardFonts.Helvetica),
    bold: await pdf.embedFont(StandardFonts.HelveticaBold),
  };
}
