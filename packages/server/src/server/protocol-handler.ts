import type { Logger } from "pino";
import { describeError } from "../shared/errors.js";
import type { SendOutcome } from "../shared/managed-connection.js";
import {
  PONG_RESPONSE,
  WSInboundMessageSchema,
  errorResponse,
  formatZodIssues,
  type ChatMessageRequest,
  type WSOutboundMessage,
} from "../shared/messages.js";
import type { ResponseSink } from "./request-processor.js";

export const PROVIDER_REQUIRED_MESSAGE =
  "LLM provider not specified. Select a provider and try again.";
export const EMPTY_MESSAGE = "Empty message. Type something or attach files.";

/** The slice of a managed connection the handler talks to. */
export interface ProtocolPeer {
  readonly id: string;
  send(payload: WSOutboundMessage): Promise<SendOutcome>;
  notePong(): void;
}

export interface ChatRequestHandler {
  process(request: ChatMessageRequest, reply: ResponseSink): Promise<void>;
}

export interface MessageProtocolHandlerOptions {
  peer: ProtocolPeer;
  processor: ChatRequestHandler;
  maxFilesPerRequest: number;
  logger: Logger;
}

/**
 * Interprets inbound frames for one connection. Validation failures get an
 * immediate error envelope; valid chat messages are processed in the
 * background so frame reads never wait on an LLM call.
 */
export class MessageProtocolHandler {
  private readonly peer: ProtocolPeer;
  private readonly processor: ChatRequestHandler;
  private readonly maxFilesPerRequest: number;
  private readonly logger: Logger;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(options: MessageProtocolHandlerOptions) {
    this.peer = options.peer;
    this.processor = options.processor;
    this.maxFilesPerRequest = options.maxFilesPerRequest;
    this.logger = options.logger.child({ module: "protocol", connectionId: options.peer.id });
  }

  /** Requests still being processed. */
  get pending(): number {
    return this.inFlight.size;
  }

  handleFrame(raw: string): void {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      this.logger.warn({ err: error, payloadLength: raw.length }, "Failed to decode payload");
      this.reply(errorResponse(`Invalid payload: ${describeError(error)}`));
      return;
    }

    const parsed = WSInboundMessageSchema.safeParse(json);
    if (!parsed.success) {
      const issues = formatZodIssues(parsed.error);
      this.logger.warn({ issues }, "Rejected malformed envelope");
      this.reply(errorResponse(`Invalid payload: ${issues}`));
      return;
    }

    const message = parsed.data;
    switch (message.type) {
      case "ping":
        this.reply(PONG_RESPONSE);
        return;
      case "pong":
        this.peer.notePong();
        return;
      case "message":
        this.handleChatMessage(message);
        return;
    }
  }

  /** Resolves once every in-flight request has replied. */
  async drain(): Promise<void> {
    await Promise.all([...this.inFlight]);
  }

  private handleChatMessage(request: ChatMessageRequest): void {
    this.logger.debug(
      {
        provider: request.provider,
        model: request.model,
        promptLength: request.prompt.length,
        historyLength: request.history.length,
        filesCount: request.files.length,
      },
      "Payload received"
    );

    if (request.provider.trim() === "") {
      this.logger.warn({ model: request.model }, "Empty provider received");
      this.reply(errorResponse(PROVIDER_REQUIRED_MESSAGE));
      return;
    }
    if (request.prompt === "" && request.files.length === 0) {
      this.reply(errorResponse(EMPTY_MESSAGE));
      return;
    }
    if (request.files.length > this.maxFilesPerRequest) {
      this.reply(
        errorResponse(`Maximum number of files exceeded. Limit: ${this.maxFilesPerRequest}`)
      );
      return;
    }

    this.logger.info({ provider: request.provider, model: request.model }, "Valid message received");
    const task = this.processor
      .process(request, (response) => this.peer.send(response))
      .catch((error: unknown) => {
        this.logger.error({ err: error }, "Request processing failed");
      })
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);
  }

  private reply(message: WSOutboundMessage): void {
    void this.peer
      .send(message)
      .then((outcome) => {
        if (outcome.status === "rejected") {
          this.logger.warn({ type: message.type, reason: outcome.reason }, "Reply dropped");
        }
      })
      .catch((error: unknown) => {
        this.logger.error({ err: error, type: message.type }, "Failed to send reply");
      });
  }
}
