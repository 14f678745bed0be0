import fs from "fs";
import path from "path";
import axios from "axios";
import { load } from "cheerio";
import iconv from "iconv-lite";
import { PDFParse } from "pdf-parse";
import { z } from "zod";
import { ConfigurationError } from "../errors/errors";
import { cleanText } from "../normalizer/text.cleaner";
import { Document, MetadataValue } from "./types";

export type SourceType = "text" | "html" | "pdf";

const EXTENSION_TYPES: Record<string, SourceType> = {
  ".txt": "text",
  ".md": "text",
  ".html": "html",
  ".htm": "html",
  ".pdf": "pdf",
};

const DROP_SELECTORS = ["script", "style", "noscript", "iframe", "nav", "header", "footer"];

const BLOCK_SELECTORS = "h1, h2, h3, h4, h5, h6, p, li, pre, blockquote, td, th";

const sidecarSchema = z.record(z.union([z.string(), z.number(), z.boolean()]));

const REQUEST_HEADERS = {
  "User-Agent": "ragjudge-ingest/1.0",
  Accept: "text/html,application/pdf,text/plain;q=0.9,*/*;q=0.8",
};

interface ExtractedText {
  text: string;
  title?: string;
}

/**
 * Decodes bytes by BOM first, then by the declared charset, then UTF-8.
 */
export function decodeText(buffer: Buffer, declaredCharset?: string): string {
  if (buffer.length >= 3 && buffer[0] === 0xef && buffer[1] === 0xbb && buffer[2] === 0xbf) {
    return iconv.decode(buffer.subarray(3), "utf8");
  }
  if (buffer.length >= 2 && buffer[0] === 0xff && buffer[1] === 0xfe) {
    return iconv.decode(buffer.subarray(2), "utf16le");
  }
  if (buffer.length >= 2 && buffer[0] === 0xfe && buffer[1] === 0xff) {
    return iconv.decode(buffer.subarray(2), "utf16be");
  }

  const charset = declaredCharset?.toLowerCase();
  if (charset && charset !== "utf-8" && charset !== "utf8" && iconv.encodingExists(charset)) {
    return iconv.decode(buffer, charset);
  }
  return iconv.decode(buffer, "utf8");
}

function charsetFromContentType(contentType?: string): string | undefined {
  return contentType?.match(/charset=([a-z0-9_\-]+)/i)?.[1]?.toLowerCase();
}

function charsetFromHtmlMeta(buffer: Buffer): string | undefined {
  const head = buffer.subarray(0, 4096).toString("ascii");
  const meta =
    head.match(/<meta[^>]+charset=["']?\s*([a-z0-9_\-]+)/i) ??
    head.match(/<meta[^>]+content=["'][^"']*charset=([a-z0-9_\-]+)/i);
  return meta?.[1]?.toLowerCase();
}

export function extractHtmlText(html: string): ExtractedText {
  const $ = load(html);
  const title = $("title").first().text().trim() || $("h1").first().text().trim() || undefined;

  $(DROP_SELECTORS.join(", ")).remove();
  const root = $("main").first().length > 0 ? $("main").first() : $("body");

  const blocks: string[] = [];
  root.find(BLOCK_SELECTORS).each((_, element) => {
    const text = $(element).text().replace(/\s+/g, " ").trim();
    if (text) blocks.push(text);
  });

  const text = blocks.length > 0 ? blocks.join("\n\n") : root.text();
  return { text, title };
}

export async function extractPdfText(buffer: Buffer): Promise<ExtractedText> {
  const parser = new PDFParse({ data: new Uint8Array(buffer) });
  try {
    const result = await parser.getText();
    const text = result.text || result.pages.map((page) => page.text).join("\n\n");
    const info = await parser.getInfo().catch((error: unknown) => {
      console.warn(`PDF metadata unavailable: ${error instanceof Error ? error.message : error}`);
      return undefined;
    });
    const title = typeof info?.info?.Title === "string" ? info.info.Title.trim() : "";
    return { text, title: title || undefined };
  } finally {
    await parser.destroy();
  }
}

/** "guides/Getting Started.md" → "guides-getting-started". */
export function documentIdFromPath(relativePath: string): string {
  const withoutExtension = relativePath.replace(/\.[^./\\]+$/, "");
  return withoutExtension
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

function documentIdFromUrl(url: string): string {
  const parsed = new URL(url);
  return documentIdFromPath(`${parsed.host}${parsed.pathname}`) || parsed.host;
}

function buildDocument(
  id: string,
  sourceUri: string,
  sourceType: SourceType,
  extracted: ExtractedText,
  extraMetadata: Record<string, MetadataValue> = {}
): Document {
  const metadata: Record<string, MetadataValue> = { sourceType, ...extraMetadata };
  if (extracted.title) metadata.title = extracted.title;

  return {
    id,
    sourceUri,
    rawText: cleanText(extracted.text, { dropBoilerplate: sourceType !== "text" }),
    metadata,
  };
}

async function readSidecarMetadata(filePath: string): Promise<Record<string, MetadataValue>> {
  const sidecarPath = `${filePath}.meta.json`;
  let content: string;
  try {
    content = await fs.promises.readFile(sidecarPath, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return {};
    throw error;
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`${sidecarPath} is not valid JSON`, { cause: error });
  }

  const parsed = sidecarSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigurationError(`${sidecarPath} must be a flat object of strings, numbers and booleans`);
  }
  return parsed.data;
}

export function sourceTypeOf(filePath: string): SourceType | undefined {
  return EXTENSION_TYPES[path.extname(filePath).toLowerCase()];
}

/**
 * Loads one file. `baseDir` decides the document id (path relative to it);
 * a `<file>.meta.json` sidecar, when present, is merged into the metadata.
 */
export async function loadDocumentFile(filePath: string, baseDir = path.dirname(filePath)): Promise<Document> {
  const sourceType = sourceTypeOf(filePath);
  if (!sourceType) {
    throw new ConfigurationError(`Unsupported document type: ${filePath}`);
  }

  const buffer = await fs.promises.readFile(filePath);
  const relativePath = path.relative(baseDir, filePath);
  const extracted =
    sourceType === "pdf"
      ? await extractPdfText(buffer)
      : sourceType === "html"
        ? extractHtmlText(decodeText(buffer, charsetFromHtmlMeta(buffer)))
        : { text: decodeText(buffer) };

  const metadata = {
    fileName: path.basename(filePath),
    ...(await readSidecarMetadata(filePath)),
  };
  return buildDocument(documentIdFromPath(relativePath), filePath, sourceType, extracted, metadata);
}

async function listFiles(dir: string): Promise<string[]> {
  const entries = await fs.promises.readdir(dir, { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listFiles(fullPath)));
    } else if (entry.isFile() && sourceTypeOf(fullPath)) {
      files.push(fullPath);
    }
  }
  return files;
}

/** Every supported file under `dir`, recursively, in path order. */
export async function loadDocumentDirectory(dir: string): Promise<Document[]> {
  const files = (await listFiles(dir)).sort();
  if (files.length === 0) {
    console.warn(`No supported documents found in ${dir}`);
  }

  const documents: Document[] = [];
  for (const filePath of files) {
    documents.push(await loadDocumentFile(filePath, dir));
  }
  return documents;
}

export async function loadDocumentUrl(url: string): Promise<Document> {
  const response = await axios.get<ArrayBuffer>(url, {
    timeout: 45_000,
    responseType: "arraybuffer",
    headers: REQUEST_HEADERS,
  });
  const buffer = Buffer.from(response.data);
  const contentTypeHeader = response.headers["content-type"];
  const contentType = typeof contentTypeHeader === "string" ? contentTypeHeader : undefined;
  const charset = charsetFromContentType(contentType);

  let sourceType: SourceType;
  let extracted: ExtractedText;
  if (contentType?.includes("application/pdf") || /\.pdf$/i.test(new URL(url).pathname)) {
    sourceType = "pdf";
    extracted = await extractPdfText(buffer);
  } else if (contentType?.includes("html") ?? true) {
    sourceType = "html";
    extracted = extractHtmlText(decodeText(buffer, charset ?? charsetFromHtmlMeta(buffer)));
  } else {
    sourceType = "text";
    extracted = { text: decodeText(buffer, charset) };
  }

  return buildDocument(documentIdFromUrl(url), url, sourceType, extracted, {
    sourceDomain: new URL(url).host,
  });
}
