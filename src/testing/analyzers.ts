import { setTimeout as delay } from "node:timers/promises";

import type { AnalyzeRequest, WordAnalyzer } from "../enrichment/types.js";

/** In-process analyzer that answers from a script, optionally after a delay. */
export class ScriptedAnalyzer implements WordAnalyzer {
  public readonly name = "scripted";
  public readonly calls: AnalyzeRequest[] = [];
  private readonly reply: (request: AnalyzeRequest) => unknown;
  private readonly delayMs: number;

  constructor(reply: (request: AnalyzeRequest) => unknown, delayMs = 0) {
    this.reply = reply;
    this.delayMs = delayMs;
  }

  public async analyze(request: AnalyzeRequest, signal: AbortSignal): Promise<unknown> {
    this.calls.push(request);
    if (this.delayMs > 0) await delay(this.delayMs, undefined, { signal });
    return this.reply(request);
  }
}
