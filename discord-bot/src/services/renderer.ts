/**
 * Card renderer: the HTTP client for the Card Render Service, and the
 * handle that owns its lifecycle.
 */

import { logger } from "../utils/logger";
import { takeChars } from "../utils/tokenizer";
import type { ApiError, CardRenderRequest, HealthResponse } from "../types/api";

export interface CardRenderer {
  initialize(): Promise<void>;
  render(request: CardRenderRequest): Promise<Buffer>;
  close(): Promise<void>;
}

export interface HttpCardRendererOptions {
  baseUrl: string;
  timeoutMs: number;
}

function isApiError(value: unknown): value is ApiError {
  return typeof value === "object" && value !== null && "detail" in value && typeof value.detail === "string";
}

export class HttpCardRenderer implements CardRenderer {
  private baseUrl: string;
  private timeoutMs: number;

  constructor(options: HttpCardRendererOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs;
    logger.info(`Card renderer client initialized with base URL: ${this.baseUrl}`);
  }

  private async send(method: string, path: string, body?: unknown): Promise<Response> {
    const url = `${this.baseUrl}${path}`;

    try {
      const response = await fetch(url, {
        method,
        headers: {
          "Content-Type": "application/json",
        },
        body: body ? JSON.stringify(body) : undefined,
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (!response.ok) {
        const error: unknown = await response.json().catch(() => ({ detail: response.statusText }));
        throw new Error(isApiError(error) && error.detail ? error.detail : `HTTP ${response.status}`);
      }

      return response;
    } catch (error) {
      logger.error(`Render service request failed: ${method} ${path}`, error);
      throw error;
    }
  }

  async healthCheck(): Promise<HealthResponse> {
    const response = await this.send("GET", "/health");
    const body: unknown = await response.json();
    if (typeof body === "object" && body !== null && "status" in body && typeof body.status === "string") {
      return { status: body.status, service: "service" in body && typeof body.service === "string" ? body.service : "" };
    }
    throw new Error("Render service returned an unexpected health response");
  }

  async initialize(): Promise<void> {
    const health = await this.healthCheck();
    logger.info(`Render service is ${health.status}${health.service ? ` (${health.service})` : ""}`);
  }

  // Raw PNG bytes
  async render(request: CardRenderRequest): Promise<Buffer> {
    logger.info(`Rendering card: persona=${request.persona}, text=${takeChars(request.text, 50)}`);
    const response = await this.send("POST", "/api/cards/render/raw", request);
    const arrayBuffer = await response.arrayBuffer();
    return Buffer.from(arrayBuffer);
  }

  async close(): Promise<void> {
    logger.debug("Card renderer client closed");
  }
}

export type RendererState = "uninitialized" | "ready" | "closed";

/**
 * Owns one renderer.
 *
 *   uninitialized --acquire()--> ready --close()--> closed
 *
 * The first acquire() runs initialize(); concurrent callers share it, and a
 * failed initialize leaves the handle uninitialized so the next acquire retries.
 * acquire() after close() throws.
 */
export class RendererHandle {
  private readonly renderer: CardRenderer;
  private currentState: RendererState = "uninitialized";
  private initializing: Promise<void> | null = null;
  private leases = 0;

  constructor(renderer: CardRenderer) {
    this.renderer = renderer;
  }

  get state(): RendererState {
    return this.currentState;
  }

  get activeLeases(): number {
    return this.leases;
  }

  async acquire(): Promise<CardRenderer> {
    if (this.currentState === "closed") {
      throw new Error("Renderer has been closed");
    }
    if (this.currentState === "uninitialized") {
      this.initializing ??= this.renderer.initialize().finally(() => {
        this.initializing = null;
      });
      await this.initializing;
      // close() may have run while we waited
      if (this.state === "closed") {
        throw new Error("Renderer has been closed");
      }
      this.currentState = "ready";
    }
    this.leases += 1;
    return this.renderer;
  }

  release(): void {
    if (this.leases > 0) this.leases -= 1;
  }

  async close(): Promise<void> {
    if (this.currentState === "closed") return;
    const wasStarted = this.currentState === "ready" || this.initializing !== null;
    this.currentState = "closed";
    if (wasStarted) {
      await this.renderer.close();
    }
  }
}
