/**
 * Echo Backend
 *
 * Offline backend that never requests a tool and answers with the last
 * user message. Used for dry runs of the loop and in patch-only wiring
 * checks.
 */

import type {
  GenerationRequest,
  GenerationResult,
  ModelBackend,
} from "@taskloop/agent-runtime-core";

export class EchoBackend implements ModelBackend {
  readonly name = "echo";
  readonly model: string;

  constructor(model = "echo") {
    this.model = model;
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    let content = "";
    for (const message of request.messages) {
      if (message.role === "user") {
        content = message.content;
      }
    }
    return {
      content,
      toolCalls: [],
      finishReason: "stop",
      model: this.model,
      attempts: 1,
    };
  }
}
