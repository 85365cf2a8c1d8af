/**
 * Intent keywords and canned replies
 *
 * Used by the brain adapter to classify commands and to answer when no
 * language model is reachable.
 */

export type Intent =
  | "greeting"
  | "query_weather"
  | "query_time"
  | "query_status"
  | "command_execute"
  | "command_create"
  | "query_search"
  | "conversation"
  | "general_query";

// Order matters: the first intent with a matching keyword wins
export const INTENT_KEYWORDS: ReadonlyArray<[Intent, readonly string[]]> = [
  ["greeting", ["hello", "hi", "hey", "good morning", "good evening"]],
  ["query_weather", ["weather", "temperature", "forecast"]],
  ["query_time", ["time", "what time", "clock"]],
  ["query_status", ["status", "system", "how are you"]],
  ["command_execute", ["run", "execute", "start", "launch"]],
  ["command_create", ["create", "generate", "make", "build"]],
  ["query_search", ["search", "find", "look for"]],
  ["conversation", ["tell me about", "explain", "what is"]],
];

const FALLBACK_REPLIES: Partial<Record<Intent, readonly string[]>> = {
  greeting: [
    "Good day. How may I assist you?",
    "Welcome back. All systems operational.",
    "At your service. What can I do for you today?",
  ],
  query_status: [
    "All systems operational. Voice recognition online, visual systems active.",
  ],
};

const DEFAULT_REPLIES: readonly string[] = [
  "Certainly. I'm processing that request.",
  "Understood. How may I assist further?",
  "At your service. Please provide more details.",
];

/**
 * Classify a command by keyword match
 */
export function parseIntent(text: string): Intent {
  const lower = text.toLowerCase();
  for (const [intent, keywords] of INTENT_KEYWORDS) {
    if (keywords.some((keyword) => lower.includes(keyword))) {
      return intent;
    }
  }
  return "general_query";
}

/**
 * Pick a canned reply for an intent.
 * `random` must return a value in [0, 1).
 */
export function getFallbackReply(
  intent: Intent,
  now: Date = new Date(),
  random: () => number = Math.random,
): string {
  if (intent === "query_time") {
    const time = now.toLocaleTimeString("en-US", {
      hour: "2-digit",
      minute: "2-digit",
    });
    return `The current time is ${time}.`;
  }

  const replies = FALLBACK_REPLIES[intent] ?? DEFAULT_REPLIES;
  const index = Math.min(
    replies.length - 1,
    Math.floor(random() * replies.length),
  );
  return replies[index];
}
