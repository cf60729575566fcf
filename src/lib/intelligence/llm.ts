/**
 * @file    llm.ts
 * @purpose Structured generation with an automatic provider fallback chain.
 * @deps    @ai-sdk/google, @ai-sdk/openai, @ai-sdk/anthropic, ai, zod
 * @env     GOOGLE_GENERATIVE_AI_API_KEY, OPENAI_API_KEY, ANTHROPIC_API_KEY
 *
 * DECISION: chain order is Gemini Flash → OpenAI GPT-4o → Anthropic. The
 * chain skips any provider without an API key configured.
 */

import { google } from "@ai-sdk/google";
import { openai } from "@ai-sdk/openai";
import { anthropic } from "@ai-sdk/anthropic";
import { generateObject, type LanguageModel } from "ai";
import type { z } from "zod";
import { silentLogger, type Logger } from "../logger";

export type LLMOptions = {
    system?: string;
    prompt: string;
    temperature?: number;
    abortSignal?: AbortSignal;
};

export type ProviderEntry = {
    name: string;
    model: () => LanguageModel;   // Lazy: only instantiated when tried
};

export function getProviderChain(env: Record<string, string | undefined> = process.env): ProviderEntry[] {
    const chain: Array<ProviderEntry & { available: boolean }> = [
        {
            name: "Gemini 2.5 Flash",
            model: () => google("gemini-2.5-flash"),
            available: !!env.GOOGLE_GENERATIVE_AI_API_KEY,
        },
        {
            name: "OpenAI GPT-4o",
            model: () => openai("gpt-4o"),
            available: !!env.OPENAI_API_KEY,
        },
        {
            name: "Anthropic Claude 3.5 Sonnet",
            model: () => anthropic("claude-3-5-sonnet-20241022"),
            available: !!env.ANTHROPIC_API_KEY,
        },
    ];
    return chain.filter(p => p.available).map(({ name, model }) => ({ name, model }));
}

/**
 * Generates a schema-validated object, trying each provider in order until
 * one succeeds. Rethrows the last provider's error when all fail.
 */
export async function unifiedObjectGeneration<T>(
    options: LLMOptions & { schema: z.ZodType<T, z.ZodTypeDef, unknown>; schemaName?: string },
    providers: ProviderEntry[] = getProviderChain(),
    logger: Logger = silentLogger
): Promise<T> {
    if (providers.length === 0) {
        throw new Error("No LLM providers configured. Set GOOGLE_GENERATIVE_AI_API_KEY, OPENAI_API_KEY, or ANTHROPIC_API_KEY.");
    }

    let lastError: unknown = null;

    for (let i = 0; i < providers.length; i++) {
        const provider = providers[i];
        try {
            const { object } = await generateObject({
                model: provider.model(),
                schema: options.schema,
                schemaName: options.schemaName,
                system: options.system,
                prompt: options.prompt,
                temperature: options.temperature,
                abortSignal: options.abortSignal,
            });
            return object;
        } catch (err) {
            lastError = err;
            const message = err instanceof Error ? err.message : String(err);
            const next = providers[i + 1];
            if (next) {
                logger.warn(`⚠️ ${provider.name} failed: ${message}. Falling back to ${next.name}...`);
            } else {
                logger.error(`❌ All LLM providers failed. Last error (${provider.name}): ${message}`);
            }
        }
    }

    throw lastError instanceof Error ? lastError : new Error("All LLM providers failed.");
}
