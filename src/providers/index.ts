import { ModelProvider } from "../core/types.js";
import { AnthropicProvider } from "./anthropicProvider.js";
import { BedrockProvider } from "./bedrockProvider.js";
import { OllamaProvider } from "./ollamaProvider.js";

export type ProviderName = "ollama" | "anthropic" | "bedrock";

export interface ProviderConfig {
  modelProvider: ProviderName;
  ollamaHost: string;
  ollamaModel: string;
  anthropicApiKey?: string;
  anthropicModel: string;
  anthropicMaxTokens: number;
  bedrockModelId: string;
  awsRegion: string;
}

export function buildProvider(config: ProviderConfig): ModelProvider {
  switch (config.modelProvider) {
    case "bedrock":
      return new BedrockProvider({
        modelId: config.bedrockModelId,
        region: config.awsRegion,
      });

    case "anthropic":
      if (!config.anthropicApiKey) {
        throw new Error("ANTHROPIC_API_KEY is required when MODEL_PROVIDER=anthropic");
      }
      return new AnthropicProvider({
        apiKey: config.anthropicApiKey,
        model: config.anthropicModel,
        maxTokens: config.anthropicMaxTokens,
      });

    case "ollama":
      return new OllamaProvider({
        host: config.ollamaHost,
        model: config.ollamaModel,
      });
  }
}
