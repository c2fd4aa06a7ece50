/**
 * Answerer Types
 * Interface for the external answering service
 */

// ============================================
// ANSWER SERVICE INTERFACE
// ============================================

export interface AnswerRequest {
  systemPrompt: string;
  userPrompt: string;
}

/**
 * Answering service - abstracts the model provider
 */
export interface AnswerService {
  /** Provider name used in logs and responses */
  readonly name: string;

  /**
   * Check if the service has what it needs to be called
   */
  isReady(): boolean;

  /**
   * Free-text completion. Throws UpstreamTransportError on any failure.
   */
  complete(request: AnswerRequest): Promise<string>;
}
