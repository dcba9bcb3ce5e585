/**
 * AI Provider Factory
 * Creates the appropriate AI provider based on configuration
 */

import { AIProvider, AIProviderConfig, ProviderName, PROVIDER_NAMES, isProviderName } from "./types";
import { ConfigError } from "../types";
import { OpenAIProvider } from "./openai";
import { AnthropicProvider } from "./anthropic";
import { GoogleProvider } from "./google";
import { LocalProvider } from "./local";

export function createAIProvider(
    providerName: ProviderName,
    config: AIProviderConfig
): AIProvider {
    switch (providerName) {
        case "openai":
        case "gpt":
            return new OpenAIProvider(config);
        case "groq":
            return new OpenAIProvider(config, "groq");
        case "openrouter":
            return new OpenAIProvider(config, "openrouter");
        case "anthropic":
        case "claude":
            return new AnthropicProvider(config);
        case "google":
        case "gemini":
            return new GoogleProvider(config);
        case "local":
        case "ollama":
            return new LocalProvider(config);
    }
}

/** Parse a user-supplied provider name (case-insensitive); unknown names are a configuration error */
export function resolveProviderName(name: string): ProviderName {
    const lowered = name.trim().toLowerCase();
    if (!isProviderName(lowered)) {
        throw new ConfigError(`Unknown AI provider "${name}". Expected one of: ${PROVIDER_NAMES.join(", ")}`);
    }
    return lowered;
}

// Normalize aliases to canonical provider names
export function normalizeProviderName(name: ProviderName): ProviderName {
    switch (name) {
        case "gpt":
            return "openai";
        case "claude":
            return "anthropic";
        case "gemini":
            return "google";
        case "ollama":
            return "local";
        default:
            return name;
    }
}

/** Local models run without credentials */
export function requiresApiKey(name: ProviderName): boolean {
    return normalizeProviderName(name) !== "local";
}

export type { AIProvider, AIProviderConfig, ProviderName, TextCapability, VisionCapability } from "./types";
export { DEFAULT_MODELS, PROVIDER_NAMES, isProviderName } from "./types";
