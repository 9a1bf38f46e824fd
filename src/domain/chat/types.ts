/**
 * Request-scoped chat entities. None of them outlive a single request.
 */
export interface ChatTurn {
  role: "user" | "assistant";
  content: string;
}

export type ChatHistory = ChatTurn[];

export interface ChatRequest {
  message: string;
  conversationHistory?: ChatHistory;
}

export interface ChatResponse {
  response: string;
  sources: string[];
}
