import Anthropic from "@anthropic-ai/sdk";

let anthropicClient: Anthropic | null = null;

/** Lazily built so that importing modules never requires ANTHROPIC_API_KEY. */
export function getAnthropicClient(): Anthropic {
    if (!anthropicClient) {
        anthropicClient = new Anthropic({
            apiKey: process.env.ANTHROPIC_API_KEY,
        });
    }
    return anthropicClient;
}
