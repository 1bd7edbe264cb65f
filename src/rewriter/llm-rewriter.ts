import type { DetectionResult } from "../schema/detection.js";
import type { ChatClient } from "./chat-client.js";
import type { RewriteContext, Rewriter } from "./rewriter.js";
import { REWRITE_SYSTEM_PROMPT, buildRewritePrompt } from "./prompt.js";
import { extractHtmlDocument } from "../utils/html-blocks.js";

/** Rewriter that asks a chat model to move overlapping blocks apart */
export class LlmRewriter implements Rewriter {
  constructor(private readonly chat: ChatClient) {}

  async rewrite(
    markup: string,
    detection: DetectionResult,
    context: RewriteContext
  ): Promise<string> {
    const reply = await this.chat.complete({
      messages: [
        { role: "system", content: REWRITE_SYSTEM_PROMPT },
        {
          role: "user",
          content: buildRewritePrompt(markup, detection, context.pageId, context.preserveBlocks),
        },
      ],
      temperature: 0.3,
      maxTokens: 4000,
    });

    const html = extractHtmlDocument(reply);
    if (!/<[a-z!]/i.test(html)) {
      throw new Error("Rewrite reply contains no HTML");
    }
    return html;
  }
}
