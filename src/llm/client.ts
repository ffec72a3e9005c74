import OpenAI from "openai";
import type { Config } from "../config/types.js";
import { ConfigurationError, GenerationError, errorMessage } from "../errors.js";

let openaiClient: OpenAI | null = null;
let openaiClientKey: string | null = null;

export function getOpenAIClient(apiKey: string | undefined): OpenAI {
  if (!apiKey) {
    throw new ConfigurationError("OPENAI_API_KEY is not set. Set it in .env to use the openai backend.");
  }
  if (!openaiClient || openaiClientKey !== apiKey) {
    openaiClient = new OpenAI({ apiKey });
    openaiClientKey = apiKey;
  }
  return openaiClient;
}

export async function chat(
  config: Pick<Config, "llm" | "openai">,
  opts: { userMessage: string },
): Promise<string> {
  const client = getOpenAIClient(config.openai.apiKey);

  let content: string | undefined;
  try {
    const response = await client.chat.completions.create({
      model: config.llm.model,
      temperature: config.llm.temperature,
      max_tokens: config.llm.maxTokens,
      messages: [{ role: "user", content: opts.userMessage }],
    });
    content = response.choices[0]?.message?.content?.trim();
  } catch (err) {
    throw new GenerationError(`OpenAI generation failed: ${errorMessage(err)}`, "openai", { cause: err });
  }

  if (!content) {
    throw new GenerationError("Empty response from OpenAI", "openai");
  }
  return content;
}
