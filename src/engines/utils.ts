import type { AIRequest, ChatMessage } from "./types.js"

export function formatContext(context: AIRequest["context"]): string | null {
  if (!context || Object.keys(context).length === 0) {
    return null
  }
  return JSON.stringify(context, null, 2)
}

/** System message first, then the context block, joined into one system text. */
export function buildSystemText(request: AIRequest): string | undefined {
  const parts: string[] = []

  if (request.systemMessage?.trim()) {
    parts.push(request.systemMessage.trim())
  }

  const context = formatContext(request.context)
  if (context) {
    parts.push(`Context information:\n${context}`)
  }

  return parts.length > 0 ? parts.join("\n\n") : undefined
}

export function buildMessages(request: AIRequest): ChatMessage[] {
  const messages: ChatMessage[] = []

  const system = buildSystemText(request)
  if (system) {
    messages.push({ role: "system", content: system })
  }

  messages.push({ role: "user", content: request.prompt })
  return messages
}

export function elapsedSeconds(startedAt: number): number {
  return (Date.now() - startedAt) / 1000
}
