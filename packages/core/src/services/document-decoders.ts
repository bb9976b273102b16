/**
 * Binary document decoders
 *
 * PDF via pdf-parse, DOCX via mammoth. A decoder never throws: malformed
 * input decodes to "" and is later rejected by the quality gate.
 */

import { PDFParse } from "pdf-parse";
import mammoth from "mammoth";
import { createChildLogger } from "../utils/logger";
import { describeError } from "../utils/errors";

const log = createChildLogger({ component: "document-decoders" });

/**
 * Extract text from PDF bytes
 */
export async function pdfToText(data: Uint8Array): Promise<string> {
  const parser = new PDFParse({ data });
  try {
    const result = await parser.getText();
    return result.text || "";
  } catch (error) {
    log.debug({ error: describeError(error) }, "PDF decode failed");
    return "";
  } finally {
    try {
      await parser.destroy();
    } catch (error) {
      log.debug({ error: describeError(error) }, "PDF parser cleanup failed");
    }
  }
}

/**
 * Extract text from DOCX bytes
 */
export async function docxToText(data: Uint8Array): Promise<string> {
  try {
    const result = await mammoth.extractRawText({
      buffer: Buffer.from(data),
    });
    return result.value || "";
  } catch (error) {
    log.debug({ error: describeError(error) }, "DOCX decode failed");
    return "";
  }
}
