import { readFileSync } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

export type FileType =
  | "text"
  | "image"
  | "pdf"
  | "docx"
  | "xlsx"
  | "code"
  | "markdown"
  | "yaml"
  | "json"
  | "xml"
  | "csv"
  | "binary";

export type FileMetadata = Record<string, string | number>;

export interface ProcessedFile {
  name: string;
  /** Extracted text, or base64 when `isBase64` is set. */
  content: string;
  contentType: string;
  fileType: FileType;
  size: number;
  isBase64: boolean;
  metadata: FileMetadata;
}

export interface FileProcessor {
  processFile(name: string, bytes: Uint8Array, contentTypeHint?: string): ProcessedFile;
}

const FileTypeTablesSchema = z.object({
  imageExtensions: z.array(z.string()),
  textExtensions: z.array(z.string()),
  codeExtensions: z.array(z.string()),
  contentTypes: z.record(z.string()),
});

type FileTypeTables = z.infer<typeof FileTypeTablesSchema>;

let cachedTables: FileTypeTables | null = null;

function loadFileTypeTables(): FileTypeTables {
  if (cachedTables) {
    return cachedTables;
  }
  const tablesPath = fileURLToPath(new URL("./file-types.json", import.meta.url));
  cachedTables = FileTypeTablesSchema.parse(JSON.parse(readFileSync(tablesPath, "utf-8")));
  return cachedTables;
}

export const MAX_IMAGE_SIZE_BYTES = 10 * 1024 * 1024;

const SPECIFIC_TEXT_TYPES: Record<string, FileType> = {
  ".json": "json",
  ".yaml": "yaml",
  ".yml": "yaml",
  ".xml": "xml",
  ".md": "markdown",
  ".markdown": "markdown",
  ".csv": "csv",
};

const IMAGE_SIGNATURES: Array<{ format: string; bytes: number[]; offset?: number }> = [
  { format: "png", bytes: [0x89, 0x50, 0x4e, 0x47] },
  { format: "jpeg", bytes: [0xff, 0xd8, 0xff] },
  { format: "gif", bytes: [0x47, 0x49, 0x46, 0x38] },
  { format: "bmp", bytes: [0x42, 0x4d] },
  { format: "ico", bytes: [0x00, 0x00, 0x01, 0x00] },
  { format: "webp", bytes: [0x57, 0x45, 0x42, 0x50], offset: 8 },
];

function detectImageFormat(bytes: Uint8Array): string | null {
  for (const signature of IMAGE_SIGNATURES) {
    const offset = signature.offset ?? 0;
    if (signature.bytes.every((value, index) => bytes[offset + index] === value)) {
      return signature.format;
    }
  }
  return null;
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

function decodeText(bytes: Uint8Array): string | null {
  if (bytes.subarray(0, 8000).includes(0)) {
    return null;
  }
  try {
    return utf8.decode(bytes);
  } catch {
    return null;
  }
}

/**
 * Classifies uploads and extracts what the prompt can use. Images pass through
 * as base64, text-like files are decoded, office documents and PDFs need an
 * extraction backend this processor does not provide.
 */
export class BasicFileProcessor implements FileProcessor {
  private readonly tables = loadFileTypeTables();

  processFile(name: string, bytes: Uint8Array, contentTypeHint?: string): ProcessedFile {
    if (bytes.length === 0) {
      throw new Error(`Empty file: ${name}`);
    }
    const ext = path.extname(name).toLowerCase();
    const contentType =
      this.tables.contentTypes[ext] ?? (contentTypeHint || "application/octet-stream");
    const base: Omit<ProcessedFile, "content" | "fileType" | "isBase64"> = {
      name,
      contentType,
      size: bytes.length,
      metadata: {},
    };

    if (this.tables.imageExtensions.includes(ext) || contentType.startsWith("image/")) {
      return this.processImage(base, bytes, ext);
    }
    if (ext === ".pdf" || contentType === "application/pdf") {
      throw new Error("PDF text extraction is not supported");
    }
    if (ext === ".docx" || contentType.includes("wordprocessingml")) {
      throw new Error("DOCX text extraction is not supported");
    }
    if (ext === ".xlsx" || contentType.includes("spreadsheetml")) {
      throw new Error("XLSX text extraction is not supported");
    }

    const text = decodeText(bytes);
    const textLike =
      this.tables.textExtensions.includes(ext) ||
      contentType.startsWith("text/") ||
      !(ext in this.tables.contentTypes);
    if (text !== null && textLike) {
      return this.processText(base, text, ext);
    }

    return {
      ...base,
      fileType: "binary",
      isBase64: false,
      content: `[Binary file: ${name} - ${bytes.length} bytes - Type: ${contentType}]`,
    };
  }

  private processImage(
    base: Omit<ProcessedFile, "content" | "fileType" | "isBase64">,
    bytes: Uint8Array,
    ext: string
  ): ProcessedFile {
    if (bytes.length > MAX_IMAGE_SIZE_BYTES) {
      throw new Error(`Image exceeds the ${MAX_IMAGE_SIZE_BYTES / 1024 / 1024} MB limit`);
    }
    const format = ext === ".svg" ? "svg" : detectImageFormat(bytes);
    if (!format) {
      throw new Error("File is not a valid image");
    }
    return {
      ...base,
      fileType: "image",
      isBase64: true,
      content: Buffer.from(bytes).toString("base64"),
      metadata: { ...base.metadata, format },
    };
  }

  private processText(
    base: Omit<ProcessedFile, "content" | "fileType" | "isBase64">,
    text: string,
    ext: string
  ): ProcessedFile {
    const metadata: FileMetadata = { lines: text.split("\n").length };
    let fileType: FileType = SPECIFIC_TEXT_TYPES[ext] ?? "text";
    if (this.tables.codeExtensions.includes(ext)) {
      fileType = "code";
      metadata.language = ext.slice(1);
    }
    return {
      ...base,
      fileType,
      isBase64: false,
      content: text,
      metadata,
    };
  }
}
