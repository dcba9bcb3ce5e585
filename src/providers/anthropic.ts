/**
 * Anthropic Provider
 * Uses the official @anthropic-ai/sdk messages API
 */

import Anthropic from "@anthropic-ai/sdk";
import type { ContentBlock, ImageBlockParam } from "@anthropic-ai/sdk/resources/messages";
import { AIProvider, AIProviderConfig, DEFAULT_MODELS, encodeImage, requireText } from "./types";
import { healLog, errorMessage } from "../logger";

function joinText(blocks: ContentBlock[]): string {
    return blocks
        .map((b) => (b.type === "text" ? b.text : ""))
        .join("");
}

export class AnthropicProvider implements AIProvider {
    readonly name = "anthropic" as const;
    private client: Anthropic;
    private model: string;

    constructor(config: AIProviderConfig) {
        this.client = new Anthropic({ apiKey: config.apiKey, baseURL: config.baseURL });
        this.model = config.model ?? DEFAULT_MODELS.anthropic;
    }

    async ask(prompt: string): Promise<string> {
        try {
            const resp = await this.client.messages.create({
                model: this.model,
                max_tokens: 1024,
                messages: [{ role: "user", content: prompt }],
            });
            const content = joinText(resp.content);
            healLog.aiResponse(content.length);
            return requireText(content, this.name);
        } catch (aiErr) {
            healLog.strategyError("anthropic", errorMessage(aiErr));
            throw aiErr;
        }
    }

    async askVision(imagePaths: string[], question: string): Promise<string> {
        try {
            const images = await Promise.all(imagePaths.map(encodeImage));
            const imageBlocks: ImageBlockParam[] = images.map((img) => ({
                type: "image",
                source: { type: "base64", media_type: img.mimeType, data: img.data },
            }));
            const resp = await this.client.messages.create({
                model: this.model,
                max_tokens: 1024,
                messages: [{ role: "user", content: [...imageBlocks, { type: "text", text: question }] }],
            });
            const content = joinText(resp.content);
            healLog.aiResponse(content.length);
            return requireText(content, this.name);
        } catch (aiErr) {
            healLog.strategyError("anthropic-vision", errorMessage(aiErr));
            throw aiErr;
        }
    }
}
