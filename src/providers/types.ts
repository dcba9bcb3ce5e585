/**
 * AI Provider abstraction for locator-healer
 * Supports multiple AI backends: OpenAI (and OpenAI-compatible Groq / OpenRouter),
 * Anthropic, Google, Local (Ollama)
 */

import fs from "node:fs/promises";
import path from "node:path";

export type ProviderName =
    | "openai" | "gpt"
    | "anthropic" | "claude"
    | "google" | "gemini"
    | "local" | "ollama"
    | "groq"
    | "openrouter";

export const PROVIDER_NAMES: readonly ProviderName[] = [
    "openai", "gpt", "anthropic", "claude", "google", "gemini", "local", "ollama", "groq", "openrouter",
];

export function isProviderName(name: string): name is ProviderName {
    return PROVIDER_NAMES.some((p) => p === name);
}

export interface AIProviderConfig {
    apiKey: string;
    model?: string;
    /** Base URL / host override (Ollama host, OpenAI-compatible endpoint) */
    baseURL?: string;
}

/** Text capability: one prompt in, free text out. Failures reject. */
export interface TextCapability {
    ask(prompt: string): Promise<string>;
}

/** Vision capability: images plus a question in, free text out. Failures reject. */
export interface VisionCapability {
    askVision(imagePaths: string[], question: string): Promise<string>;
}

export interface AIProvider extends TextCapability, VisionCapability {
    readonly name: ProviderName;
}

export type ImageMimeType = "image/png" | "image/jpeg" | "image/gif" | "image/webp";

export interface EncodedImage {
    mimeType: ImageMimeType;
    data: string;
}

export function imageMimeType(file: string): ImageMimeType {
    switch (path.extname(file).toLowerCase()) {
        case ".jpg":
        case ".jpeg":
            return "image/jpeg";
        case ".gif":
            return "image/gif";
        case ".webp":
            return "image/webp";
        default:
            return "image/png";
    }
}

/** Read an image from disk as base64 for a multimodal request */
export async function encodeImage(file: string): Promise<EncodedImage> {
    const buffer = await fs.readFile(file);
    return { mimeType: imageMimeType(file), data: buffer.toString("base64") };
}

/** Reject blank model output so the caller's retry policy treats it as a failure */
export function requireText(content: string | null | undefined, provider: ProviderName): string {
    const text = content?.trim() ?? "";
    if (!text) throw new Error(`${provider} returned an empty response`);
    return text;
}

export const DEFAULT_MODELS: Record<ProviderName, string> = {
    openai: "gpt-4o-mini",
    gpt: "gpt-4o-mini",
    anthropic: "claude-sonnet-4-20250514",
    claude: "claude-sonnet-4-20250514",
    google: "gemini-2.5-flash",
    gemini: "gemini-2.5-flash",
    local: "llama3.2-vision",
    ollama: "llama3.2-vision",
    groq: "llama-3.1-8b-instant",
    openrouter: "deepseek/deepseek-chat",
};
