import { createGoogleGenerativeAI } from "@ai-sdk/google";
import { generateText, type LanguageModel } from "ai";
import type { TokenUsage } from "../review/types.js";

// ========================================
// プロバイダーインターフェース
// ========================================

export interface CompletionParams {
  system: string;
  temperature: number;
  maxOutputTokens: number;
  abortSignal?: AbortSignal;
}

export interface Completion {
  text: string;
  usage?: TokenUsage;
}

/**
 * 言語モデルへの単発の補完リクエスト
 * 失敗時はプロバイダーのエラーをそのまま投げる（分類は invoker 側）
 */
export interface CompletionProvider {
  readonly modelId: string;
  complete(prompt: string, params: CompletionParams): Promise<Completion>;
}

// ========================================
// AI SDK 実装
// ========================================

/**
 * AI SDK の LanguageModel をプロバイダーとして包む
 */
export function createLanguageModelProvider(model: LanguageModel, modelId: string): CompletionProvider {
  return {
    modelId,
    async complete(prompt, params) {
      const response = await generateText({
        model,
        system: params.system,
        prompt,
        temperature: params.temperature,
        maxTokens: params.maxOutputTokens,
        // リトライは invoker が共有レート制限ゲートと合わせて行う
        maxRetries: 0,
        abortSignal: params.abortSignal,
      });
      return {
        text: response.text,
        usage: {
          promptTokens: response.usage.promptTokens,
          completionTokens: response.usage.completionTokens,
        },
      };
    },
  };
}

export interface GoogleProviderOptions {
  apiKey?: string;
  // 例: gemini-2.0-flash
  modelId: string;
}

/**
 * Google AI (Gemini) プロバイダー
 */
export function createGoogleProvider(options: GoogleProviderOptions): CompletionProvider {
  const google = createGoogleGenerativeAI({
    apiKey: options.apiKey ?? process.env.GOOGLE_GENERATIVE_AI_API_KEY,
  });
  return createLanguageModelProvider(google(options.modelId), options.modelId);
}
