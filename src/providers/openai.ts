/**
 * OpenAI Provider
 * Uses the official OpenAI SDK (chat completions). Groq and OpenRouter expose the
 * same API, so they run through this class with a different base URL.
 */

import OpenAI from "openai";
import type { ChatCompletionContentPart } from "openai/resources/chat/completions";
import { AIProvider, AIProviderConfig, DEFAULT_MODELS, encodeImage, requireText } from "./types";
import { healLog, errorMessage } from "../logger";

export const COMPATIBLE_BASE_URLS = {
    groq: "https://api.groq.com/openai/v1",
    openrouter: "https://openrouter.ai/api/v1",
} as const;

type OpenAIFlavour = "openai" | "groq" | "openrouter";

export class OpenAIProvider implements AIProvider {
    readonly name: OpenAIFlavour;
    private client: OpenAI;
    private model: string;

    constructor(config: AIProviderConfig, flavour: OpenAIFlavour = "openai") {
        this.name = flavour;
        const baseURL = config.baseURL ?? (flavour === "openai" ? undefined : COMPATIBLE_BASE_URLS[flavour]);
        this.client = new OpenAI({ apiKey: config.apiKey, baseURL });
        this.model = config.model ?? DEFAULT_MODELS[flavour];
    }

    async ask(prompt: string): Promise<string> {
        try {
            const resp = await this.client.chat.completions.create({
                model: this.model,
                messages: [{ role: "user", content: prompt }],
            });
            const content = resp.choices[0]?.message?.content;
            healLog.aiResponse(content?.length ?? 0);
            return requireText(content, this.name);
        } catch (aiErr) {
            healLog.strategyError(this.name, errorMessage(aiErr));
            throw aiErr;
        }
    }

    async askVision(imagePaths: string[], question: string): Promise<string> {
        try {
            const images = await Promise.all(imagePaths.map(encodeImage));
            const content: ChatCompletionContentPart[] = [
                { type: "text", text: question },
                ...images.map((img): ChatCompletionContentPart => ({
                    type: "image_url",
                    image_url: { url: `data:${img.mimeType};base64,${img.data}` },
                })),
            ];
            const resp = await this.client.chat.completions.create({
                model: this.model,
                messages: [{ role: "user", content }],
                max_tokens: 500,
            });
            const text = resp.choices[0]?.message?.content;
            healLog.aiResponse(text?.length ?? 0);
            return requireText(text, this.name);
        } catch (aiErr) {
            healLog.strategyError(`${this.name}-vision`, errorMessage(aiErr));
            throw aiErr;
        }
    }
}
