import type { Logger } from "pino";
import type { CircuitBreakerRegistry } from "../shared/circuit-breaker.js";
import {
  CircuitOpenError,
  NetworkTimeoutError,
  RequestValidationError,
  describeError,
  isTemporaryError,
} from "../shared/errors.js";
import {
  completedResponse,
  errorResponse,
  progressResponse,
  type ChatMessageRequest,
  type FilePayload,
  type WSOutboundMessage,
} from "../shared/messages.js";
import { withRetry, type RetryPolicy, type Sleep } from "../shared/retry.js";
import type { RequestLimits } from "./config.js";
import type { FileProcessor, FileType, ProcessedFile } from "./file-processor.js";
import type { LLMClient, LLMClientResolver } from "./llm/llm-client.js";

/** Delivers one outbound envelope to the requesting peer. */
export type ResponseSink = (message: WSOutboundMessage) => Promise<unknown>;

export interface ChatRequestProcessorOptions {
  llm: LLMClientResolver;
  fileProcessor: FileProcessor;
  breakers: CircuitBreakerRegistry;
  retry: RetryPolicy;
  limits: Pick<RequestLimits, "maxFileSizeBytes" | "maxTotalUploadBytes" | "requestTimeoutMs">;
  logger: Logger;
  sleep?: Sleep;
}

const MARKDOWN_INDICATORS = [
  "```",
  "# ",
  "## ",
  "### ",
  "- ",
  "* ",
  "1. ",
  "**",
  "__",
  "*",
  "_",
  "[",
  "](",
  "|",
  "---",
  "apiVersion:",
  "kind:",
  "metadata:",
];

export function detectMarkdown(text: string): boolean {
  return MARKDOWN_INDICATORS.some((indicator) => text.includes(indicator)) || text.includes("\n\n");
}

export function formatSize(bytes: number): string {
  const unit = 1024;
  if (bytes < unit) {
    return `${bytes} B`;
  }
  let div = unit;
  let exp = 0;
  for (let n = Math.floor(bytes / unit); n >= unit; n = Math.floor(n / unit)) {
    div *= unit;
    exp++;
  }
  return `${(bytes / div).toFixed(1)} ${"KMGTPE"[exp]}B`;
}

const FILE_ICONS: Record<FileType, string> = {
  image: "🖼️",
  pdf: "📕",
  docx: "📘",
  xlsx: "📊",
  code: "💻",
  json: "📋",
  yaml: "⚙️",
  xml: "📰",
  markdown: "📝",
  csv: "📈",
  text: "📄",
  binary: "📦",
};

function fenceLanguage(file: ProcessedFile): string {
  const language = file.metadata.language;
  if (typeof language === "string") {
    return language;
  }
  switch (file.fileType) {
    case "json":
    case "yaml":
    case "xml":
      return file.fileType;
    default:
      return "";
  }
}

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

function decodeBase64(content: string): Buffer | null {
  const payload = content.replace(/^data:[^,]*;base64,/, "").replace(/\s+/g, "");
  if (payload.length % 4 !== 0 || !BASE64_PATTERN.test(payload)) {
    return null;
  }
  return Buffer.from(payload, "base64");
}

export class ChatRequestProcessor {
  private readonly logger: Logger;

  constructor(private readonly options: ChatRequestProcessorOptions) {
    this.logger = options.logger.child({ module: "request-processor" });
  }

  /**
   * Runs one chat request to completion and replies with exactly one
   * `completed` or `error` envelope, preceded by progress envelopes when files
   * are attached.
   */
  async process(request: ChatMessageRequest, reply: ResponseSink): Promise<void> {
    let fileContext = "";
    if (request.files.length > 0) {
      try {
        fileContext = await this.buildFileContext(request.files, reply);
      } catch (error) {
        await reply(errorResponse(describeError(error)));
        return;
      }
    }

    const fullPrompt = fileContext
      ? `${fileContext}\n\n---\n\n**User question:**\n${request.prompt}`
      : request.prompt;

    let client: LLMClient;
    try {
      client = this.options.llm.getClient(request.provider, request.model);
    } catch (error) {
      await reply(errorResponse(describeError(error)));
      return;
    }

    const breaker = this.options.breakers.get(client.provider);
    if (!breaker.allow()) {
      const refusal = new CircuitOpenError(client.provider);
      this.logger.warn({ provider: client.provider }, refusal.message);
      await reply(
        errorResponse(
          `LLM provider ${client.provider} is temporarily unavailable after repeated failures. Try again later.`
        )
      );
      return;
    }

    const timeoutMs = this.options.limits.requestTimeoutMs;
    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort(new NetworkTimeoutError(`LLM request timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    const startedAt = Date.now();
    let response: string;
    try {
      response = await withRetry(
        this.options.retry,
        () =>
          client.sendPrompt({
            prompt: fullPrompt,
            history: request.history,
            signal: controller.signal,
          }),
        {
          signal: controller.signal,
          sleep: this.options.sleep,
          onRetry: ({ attempt, maxAttempts, delayMs, error }) => {
            this.logger.warn(
              { provider: client.provider, attempt, maxAttempts, delayMs, err: error },
              "LLM call failed, retrying"
            );
          },
        }
      );
      breaker.recordSuccess();
    } catch (error) {
      if (isTemporaryError(error)) {
        breaker.recordFailure();
      }
      this.logger.error({ provider: client.provider, err: error }, "LLM call failed");
      await reply(errorResponse(`Error processing LLM response: ${describeError(error)}`));
      return;
    } finally {
      clearTimeout(timer);
    }

    const isMarkdown = detectMarkdown(response);
    this.logger.info(
      {
        provider: request.provider,
        isMarkdown,
        responseLength: response.length,
        filesProcessed: request.files.length,
        durationMs: Date.now() - startedAt,
      },
      "LLM response processed"
    );
    await reply(completedResponse(response, request.provider, isMarkdown));
  }

  private async buildFileContext(files: readonly FilePayload[], reply: ResponseSink): Promise<string> {
    const { maxFileSizeBytes, maxTotalUploadBytes } = this.options.limits;
    const total = files.length;
    await reply(progressResponse("Starting file processing...", 0, total, 0));

    let totalSize = 0;
    const processed: ProcessedFile[] = [];
    const failed: string[] = [];

    for (const [index, file] of files.entries()) {
      const current = index + 1;
      await reply(
        progressResponse(
          `Processing file ${current} of ${total}: ${file.name}`,
          current,
          total,
          Math.floor((current * 100) / total)
        )
      );

      let bytes: Buffer;
      if (file.isBase64) {
        const decoded = decodeBase64(file.content);
        if (!decoded) {
          failed.push(`${file.name} (base64 decode error)`);
          this.logger.warn({ file: file.name }, "Invalid base64 content");
          continue;
        }
        bytes = decoded;
      } else {
        bytes = Buffer.from(file.content, "utf-8");
      }

      const exempt = file.contentType.startsWith("image/") || file.contentType === "application/pdf";
      if (bytes.length > maxFileSizeBytes && !exempt) {
        failed.push(`${file.name} (exceeds ${maxFileSizeBytes / 1024 / 1024}MB)`);
        continue;
      }

      totalSize += bytes.length;
      if (totalSize > maxTotalUploadBytes) {
        throw new RequestValidationError(
          `Total file size exceeds the ${maxTotalUploadBytes / 1024 / 1024} MB limit`
        );
      }

      try {
        processed.push(this.options.fileProcessor.processFile(file.name, bytes, file.contentType));
      } catch (error) {
        failed.push(`${file.name} (${describeError(error)})`);
        this.logger.warn({ file: file.name, err: error }, "File processing failed");
      }
    }

    await reply(progressResponse("Building file context...", total, total, 100));

    this.logger.info(
      { total, success: processed.length, failed: failed.length, totalSize },
      "Files processed for context"
    );
    return renderFileContext(processed, failed, totalSize);
  }
}

export function renderFileContext(
  processed: readonly ProcessedFile[],
  failed: readonly string[],
  totalSize: number
): string {
  const lines: string[] = ["# 📁 FILE CONTEXT PROVIDED BY THE USER", "", "## 📑 FILE INDEX:", ""];

  processed.forEach((file, index) => {
    lines.push(
      `${index + 1}. ${FILE_ICONS[file.fileType]} **${file.name}** \`${file.fileType}\` (${formatSize(file.size)})`
    );
  });

  if (failed.length > 0) {
    lines.push("", "### ⚠️ Files that failed to process:");
    for (const entry of failed) {
      lines.push(`- ${entry}`);
    }
  }
  lines.push("", "---", "");

  processed.forEach((file, index) => {
    lines.push(`## 📄 FILE ${index + 1}/${processed.length}: ${file.name}`, "");
    const metadata = Object.entries(file.metadata);
    if (metadata.length > 0) {
      lines.push("**Metadata:**");
      for (const [key, value] of metadata) {
        lines.push(`- ${key}: ${value}`);
      }
      lines.push("");
    }
    if (file.fileType === "image") {
      lines.push(`![${file.name}](data:${file.contentType};base64,${file.content})`, "");
      lines.push("*Note: image attached for visual analysis.*", "");
    } else {
      lines.push(`\`\`\`${fenceLanguage(file)}`, file.content, "```", "");
    }
    lines.push("---", "");
  });

  lines.push(
    "",
    `**Summary:** ${processed.length} file(s) processed successfully, ${failed.length} failure(s), total size: ${formatSize(totalSize)}`,
    "",
    ""
  );
  return lines.join("\n");
}
