/**
 * Render a capability-tagged EngineRequest into chat messages.
 * Shared by every chat-style engine so previews and real calls agree.
 */

import type { EngineRequest, Message } from "./types.js";

function buildSystemContent(request: EngineRequest): string | undefined {
  const parts: string[] = [];
  if (request.staticContext?.trim()) {
    parts.push(request.staticContext.trim());
  }
  if (request.constraints && request.constraints.length > 0) {
    parts.push(
      `[CONSTRAINTS]\n${request.constraints.map((c) => `- ${c}`).join("\n")}`
    );
  }
  if (request.responseFormat === "json_object") {
    parts.push("Respond with a single valid JSON object and nothing else.");
  }
  return parts.length > 0 ? parts.join("\n\n") : undefined;
}

function buildUserContent(request: EngineRequest): string {
  const sections = [`[INSTRUCTION]\n${request.instruction}`];
  if (request.payload) {
    sections.push(`[PAYLOAD]\n${request.payload}`);
  }
  if (request.operands.length === 1) {
    sections.push(`[DATA]\n${request.operands[0]}`);
  } else {
    request.operands.forEach((operand, index) => {
      sections.push(`[OPERAND ${index + 1}]\n${operand}`);
    });
  }
  return sections.join("\n\n");
}

export function buildMessages(request: EngineRequest): Message[] {
  const system = buildSystemContent(request);
  const messages: Message[] = [];
  if (system) {
    messages.push({ role: "system", content: system });
  }
  messages.push({ role: "user", content: buildUserContent(request) });
  return messages;
}

export function renderMessages(messages: Message[]): string {
  return messages.map((m) => `${m.role}:\n${m.content}`).join("\n\n");
}
