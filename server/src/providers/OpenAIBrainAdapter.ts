/**
 * OpenAI Brain Adapter
 *
 * Classifies a command by keyword, then asks the chat model for a reply with
 * the user's recent turns as memory. Canned replies stand in whenever the
 * model is unavailable.
 */

import OpenAI from "openai";
import {
  getFallbackReply,
  parseIntent,
  type Intent,
} from "../config/intents.js";
import type { ConversationRepository } from "../storage/ConversationStore.js";
import type {
  BrainAdapter,
  BrainStatus,
  CommandAction,
  CommandResult,
} from "./InferenceAdapters.js";

type ChatMessage = OpenAI.Chat.Completions.ChatCompletionMessageParam;

export interface OpenAIBrainOptions {
  apiKey: string;
  model: string;
  temperature: number;
  maxTokens: number;
  /** Turns recalled per request; 0 disables memory */
  historyTurns?: number;
  memory?: ConversationRepository | null;
  now?: () => Date;
  random?: () => number;
}

export const ASSISTANT_PERSONA = [
  "You are a composed, courteous voice assistant.",
  "Answer in one to three short sentences suitable for speech.",
  "Be precise and helpful; never invent facts you do not have.",
].join(" ");

export const ERROR_REPLY =
  "I apologize, but I encountered an error processing that request.";

export function deriveActions(intent: Intent, text: string): CommandAction[] {
  switch (intent) {
    case "command_execute":
      return [{ type: "execute", details: text }];
    case "command_create":
      return [{ type: "create", details: text }];
    default:
      return [];
  }
}

export class OpenAIBrainAdapter implements BrainAdapter {
  private client: OpenAI | null;
  private readonly memory: ConversationRepository | null;
  private readonly historyTurns: number;
  private readonly now: () => Date;
  private readonly random: () => number;

  constructor(private readonly options: OpenAIBrainOptions) {
    this.client = options.apiKey ? new OpenAI({ apiKey: options.apiKey }) : null;
    this.memory = options.memory ?? null;
    this.historyTurns = options.historyTurns ?? 10;
    this.now = options.now ?? (() => new Date());
    this.random = options.random ?? Math.random;

    if (!this.client) {
      console.warn("[BrainAdapter] No OpenAI API key, using canned replies");
    }
  }

  async processCommand(
    text: string,
    userId: string,
    context?: Record<string, unknown>,
  ): Promise<CommandResult> {
    try {
      const intent = parseIntent(text);
      const reply = await this.generateReply(text, intent, userId, context);

      return {
        text: reply,
        intent,
        actions: deriveActions(intent, text),
        confidence: 0.95,
        timestamp: this.now().toISOString(),
      };
    } catch (error) {
      console.error("[BrainAdapter] Command processing failed:", error);
      return {
        text: ERROR_REPLY,
        intent: "error",
        actions: [],
        confidence: 0,
        timestamp: this.now().toISOString(),
      };
    }
  }

  private async generateReply(
    text: string,
    intent: Intent,
    userId: string,
    context?: Record<string, unknown>,
  ): Promise<string> {
    if (!this.client) {
      return getFallbackReply(intent, this.now(), this.random);
    }

    const messages: ChatMessage[] = [
      { role: "system", content: ASSISTANT_PERSONA },
      ...this.recall(userId),
    ];
    if (context && Object.keys(context).length > 0) {
      messages.push({
        role: "system",
        content: `Client context: ${JSON.stringify(context)}`,
      });
    }
    messages.push({ role: "user", content: text });

    try {
      const completion = await this.client.chat.completions.create({
        model: this.options.model,
        messages,
        temperature: this.options.temperature,
        max_tokens: this.options.maxTokens,
      });
      const content = completion.choices[0]?.message?.content?.trim();
      if (content) {
        return content;
      }
      console.warn("[BrainAdapter] Empty completion, using canned reply");
    } catch (error) {
      console.warn("[BrainAdapter] Chat completion failed, using canned reply:", error);
    }
    return getFallbackReply(intent, this.now(), this.random);
  }

  private recall(userId: string): ChatMessage[] {
    if (!this.memory || this.historyTurns <= 0) {
      return [];
    }
    try {
      return this.memory
        .getRecentTurns(userId, this.historyTurns)
        .map((turn): ChatMessage =>
          turn.role === "assistant"
            ? { role: "assistant", content: turn.content }
            : { role: "user", content: turn.content },
        );
    } catch (error) {
      console.warn("[BrainAdapter] Could not load conversation memory:", error);
      return [];
    }
  }

  status(): BrainStatus {
    return {
      ready: true,
      mockMode: this.client === null,
      model: this.client ? this.options.model : null,
    };
  }
}
