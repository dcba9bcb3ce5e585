/**
 * Local LLM Provider (Ollama)
 * Connects to a locally running Ollama instance for private, offline repair;
 * no API key or cloud call needed. Vision requests need a multimodal model.
 */

import { Ollama } from "ollama";
import { AIProvider, AIProviderConfig, DEFAULT_MODELS, encodeImage, requireText } from "./types";
import { healLog, errorMessage } from "../logger";

export const DEFAULT_OLLAMA_HOST = "http://127.0.0.1:11434";

export class LocalProvider implements AIProvider {
    readonly name = "local" as const;
    private client: Ollama;
    private model: string;

    constructor(config: AIProviderConfig) {
        this.client = new Ollama({ host: config.baseURL ?? DEFAULT_OLLAMA_HOST });
        this.model = config.model ?? DEFAULT_MODELS.local;
    }

    async ask(prompt: string): Promise<string> {
        try {
            const resp = await this.client.chat({
                model: this.model,
                messages: [{ role: "user", content: prompt }],
                stream: false,
                options: { temperature: 0 },
            });
            const content = resp.message?.content;
            healLog.aiResponse(content?.length ?? 0);
            return requireText(content, this.name);
        } catch (aiErr) {
            healLog.strategyError("local", errorMessage(aiErr));
            throw aiErr;
        }
    }

    async askVision(imagePaths: string[], question: string): Promise<string> {
        try {
            const images = await Promise.all(imagePaths.map(encodeImage));
            const resp = await this.client.chat({
                model: this.model,
                messages: [{ role: "user", content: question, images: images.map((img) => img.data) }],
                stream: false,
                options: { temperature: 0 },
            });
            const content = resp.message?.content;
            healLog.aiResponse(content?.length ?? 0);
            return requireText(content, this.name);
        } catch (aiErr) {
            healLog.strategyError("local-vision", errorMessage(aiErr));
            throw aiErr;
        }
    }
}
