/**
 * Google Provider
 * Uses the official @google/genai SDK (googleapis/js-genai)
 */

import { GoogleGenAI } from "@google/genai";
import { AIProvider, AIProviderConfig, DEFAULT_MODELS, encodeImage, requireText } from "./types";
import { healLog, errorMessage } from "../logger";

export class GoogleProvider implements AIProvider {
    readonly name = "google" as const;
    private ai: GoogleGenAI;
    private model: string;

    constructor(config: AIProviderConfig) {
        this.ai = new GoogleGenAI({ apiKey: config.apiKey });
        this.model = config.model ?? DEFAULT_MODELS.google;
    }

    async ask(prompt: string): Promise<string> {
        try {
            const response = await this.ai.models.generateContent({
                model: this.model,
                contents: prompt,
            });
            const content = response.text;
            healLog.aiResponse(content?.length ?? 0);
            return requireText(content, this.name);
        } catch (aiErr) {
            healLog.strategyError("google", errorMessage(aiErr));
            throw aiErr;
        }
    }

    async askVision(imagePaths: string[], question: string): Promise<string> {
        try {
            const images = await Promise.all(imagePaths.map(encodeImage));
            const response = await this.ai.models.generateContent({
                model: this.model,
                contents: [{
                    role: "user",
                    parts: [
                        { text: question },
                        ...images.map((img) => ({ inlineData: { mimeType: img.mimeType, data: img.data } })),
                    ],
                }],
            });
            const content = response.text;
            healLog.aiResponse(content?.length ?? 0);
            return requireText(content, this.name);
        } catch (aiErr) {
            healLog.strategyError("google-vision", errorMessage(aiErr));
            throw aiErr;
        }
    }
}
