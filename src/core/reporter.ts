/**
 * Completion reporter
 *
 * Sends the outcome of the run to the host agent exactly once, as an XML-RPC
 * call `complete(success, error, resultsPath)`. There is no retry: once the
 * analysis is over the agent is the only way out of the guest.
 */

import { ReportError, errorMessage } from "../lib/errors.js";
import { logger as rootLogger, type Logger } from "../lib/logger.js";

import type { OutcomeRecord } from "./types.js";

/** Agent endpoint inside the guest */
export const DEFAULT_HOST_URL = "http://127.0.0.1:8000";

const DEFAULT_TIMEOUT_MS = 30000;

/**
 * Delivers an outcome to the host
 */
export interface CompletionTransport {
  complete(outcome: OutcomeRecord): Promise<void>;
}

const ANSI_ESCAPE = /\x1B\[[0-9;]*[A-Za-z]/g;
const XML_FORBIDDEN = /[^\x09\x0A\x0D\x20-\uD7FF\uE000-\uFFFD\u{10000}-\u{10FFFF}]/gu;
const FAULT_RESPONSE = /<methodResponse>\s*<fault>/;

/**
 * Drop terminal colour codes and characters XML 1.0 cannot carry
 */
export function sanitizeXmlText(value: string): string {
  return value.replace(ANSI_ESCAPE, "").replace(XML_FORBIDDEN, "");
}

function escapeXml(value: string): string {
  return sanitizeXmlText(value)
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}

/**
 * Encode the `complete` method call
 */
export function encodeCompleteCall(outcome: OutcomeRecord): string {
  const params = [
    `<value><boolean>${outcome.success ? 1 : 0}</boolean></value>`,
    `<value><string>${escapeXml(outcome.errorMessage)}</string></value>`,
    `<value><string>${escapeXml(outcome.resultsPath)}</string></value>`,
  ];

  return [
    `<?xml version="1.0"?>`,
    `<methodCall>`,
    `<methodName>complete</methodName>`,
    `<params>`,
    ...params.map((param) => `<param>${param}</param>`),
    `</params>`,
    `</methodCall>`,
  ].join("\n");
}

export interface XmlRpcTransportConfig {
  url: string;
  timeoutMs: number;
  fetch: typeof fetch;
}

/**
 * XML-RPC over HTTP POST, as spoken by the guest agent
 */
export class XmlRpcTransport implements CompletionTransport {
  private readonly config: XmlRpcTransportConfig;

  constructor(config: Partial<XmlRpcTransportConfig> = {}) {
    this.config = {
      url: config.url ?? DEFAULT_HOST_URL,
      timeoutMs: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      fetch: config.fetch ?? fetch,
    };
  }

  get url(): string {
    return this.config.url;
  }

  async complete(outcome: OutcomeRecord): Promise<void> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.timeoutMs);

    try {
      const response = await this.config.fetch(this.config.url, {
        method: "POST",
        headers: { "Content-Type": "text/xml" },
        body: encodeCompleteCall(outcome),
        signal: controller.signal,
      });

      const body = await response.text();
      if (!response.ok) {
        throw new Error(`Agent responded ${response.status}: ${body}`);
      }
      if (FAULT_RESPONSE.test(body)) {
        throw new Error(`Agent returned a fault: ${body}`);
      }
    } finally {
      clearTimeout(timeout);
    }
  }
}

/**
 * One-shot reporter: the first call is delivered, later calls are ignored
 */
export class CompletionReporter {
  private attempted: OutcomeRecord | null = null;
  private readonly log: Logger;

  constructor(
    private readonly transport: CompletionTransport,
    log: Logger = rootLogger
  ) {
    this.log = log.child("[reporter]");
  }

  /** Whether a report has already been attempted */
  get reported(): boolean {
    return this.attempted !== null;
  }

  /** The outcome that was (or was attempted to be) sent */
  get outcome(): OutcomeRecord | null {
    return this.attempted;
  }

  /**
   * Send `outcome` to the host. Resolves to false when a report was already
   * attempted; rejects with ReportError when delivery fails.
   */
  async report(outcome: OutcomeRecord): Promise<boolean> {
    if (this.attempted !== null) {
      this.log.warn("Completion already reported, ignoring later outcome");
      return false;
    }
    this.attempted = outcome;

    try {
      await this.transport.complete(outcome);
    } catch (error) {
      const message = `Unable to report completion to the host: ${errorMessage(error)}`;
      this.log.error(message);
      throw new ReportError(message, { outcome });
    }

    this.log.info(outcome.success ? "Analysis completed" : `Analysis failed: ${outcome.errorMessage}`);
    return true;
  }
}

/**
 * Create a reporter talking XML-RPC to `url`
 */
export function createReporter(url: string = DEFAULT_HOST_URL, log?: Logger): CompletionReporter {
  return new CompletionReporter(new XmlRpcTransport({ url }), log);
}
