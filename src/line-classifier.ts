import { ConfigError } from "./errors";
import type { ConsolePatterns } from "./types";
import { errorMessage } from "./types";

export type LineClassification =
  | { kind: "chat"; username: string; message: string }
  | { kind: "connect"; username: string; address?: string }
  | { kind: "disconnect"; username: string; reason?: string }
  | { kind: "unmatched" };

export interface LineClassifier {
  classify(text: string): LineClassification;
}

function compile(field: keyof ConsolePatterns, raw: string, requiredGroups: string[]): RegExp {
  // Accept "(?P<name>" group syntax as well, so patterns written for other regex engines keep working
  const source = raw.replace(/\(\?P</g, "(?<");
  let pattern: RegExp;
  try {
    pattern = new RegExp(source);
  } catch (err: unknown) {
    throw new ConfigError(`console.${field} is not a valid regular expression: ${errorMessage(err)}`);
  }
  for (const group of requiredGroups) {
    if (!source.includes(`(?<${group}>`)) {
      throw new ConfigError(`console.${field} must define a named group "${group}"`);
    }
  }
  return pattern;
}

/**
 * Classifies console lines with the three configured patterns. A chat match
 * wins over connect/disconnect, so players cannot fake a join by typing one.
 */
export class RegexLineClassifier implements LineClassifier {
  private readonly connect: RegExp;
  private readonly disconnect: RegExp;
  private readonly chat: RegExp;

  constructor(patterns: ConsolePatterns) {
    this.connect = compile("playerConnected", patterns.playerConnected, ["username"]);
    this.disconnect = compile("playerDisconnected", patterns.playerDisconnected, ["username"]);
    this.chat = compile("playerChat", patterns.playerChat, ["username", "message"]);
  }

  classify(text: string): LineClassification {
    const chat = this.chat.exec(text);
    if (chat?.groups?.username !== undefined) {
      return { kind: "chat", username: chat.groups.username, message: chat.groups.message ?? "" };
    }

    const connect = this.connect.exec(text);
    if (connect?.groups?.username !== undefined) {
      return { kind: "connect", username: connect.groups.username, address: connect.groups.ip };
    }

    const disconnect = this.disconnect.exec(text);
    if (disconnect?.groups?.username !== undefined) {
      return { kind: "disconnect", username: disconnect.groups.username, reason: disconnect.groups.reason };
    }

    return { kind: "unmatched" };
  }
}
