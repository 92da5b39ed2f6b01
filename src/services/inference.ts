/**
 * InferenceClient: schema-constrained completions from a language model
 */

import { Config, Context, Effect, Layer, Redacted } from "effect"
import OpenAI from "openai"
import { type ExtractionError, ExtractionErrors } from "../domain"
import { PipelineConfig } from "./config"

export interface CompletionRequest {
  /** Instructions that frame every request */
  readonly system: string
  readonly prompt: string
  /** Name of the response schema, as reported by the provider */
  readonly schemaName: string
  /** JSON Schema the response must follow */
  readonly schema: Readonly<Record<string, unknown>>
}

/**
 * Service Definition for structured completions.
 * Resolves with the parsed JSON response; its shape is checked by the caller.
 */
export class InferenceClient extends Context.Tag("InferenceClient")<
  InferenceClient,
  {
    readonly complete: (request: CompletionRequest) => Effect.Effect<unknown, ExtractionError>
  }
>() {}

/**
 * Maps an SDK failure to a provider-throttling, transport or provider error
 */
export const classifyProviderError = (error: unknown): ExtractionError => {
  if (error instanceof OpenAI.RateLimitError) return ExtractionErrors.providerThrottled(error.message)
  if (error instanceof OpenAI.APIConnectionError) return ExtractionErrors.transportFailure(error.message)
  if (error instanceof OpenAI.APIError) return ExtractionErrors.providerError(error.message)
  return ExtractionErrors.transportFailure(error instanceof Error ? error.message : String(error))
}

/**
 * Parses the message content of a completion
 */
export const parseCompletionContent = (
  content: string | null | undefined,
  refusal: string | null | undefined
): Effect.Effect<unknown, ExtractionError> => {
  if (refusal) return Effect.fail(ExtractionErrors.malformedResponse(`model refused: ${refusal}`))
  if (!content) return Effect.fail(ExtractionErrors.malformedResponse("completion had no content"))
  return Effect.try({
    try: (): unknown => JSON.parse(content),
    catch: (error) => ExtractionErrors.malformedResponse(`content is not JSON: ${String(error)}`)
  })
}

/**
 * OpenAI Chat Completions with strict JSON-schema output.
 * SDK retries are turned off: a failed call fails the trip, and retry policy lives in the pipeline.
 */
export const OpenAIInferenceLive = Layer.effect(
  InferenceClient,
  Effect.gen(function* () {
    const apiKey = yield* Config.redacted("OPENAI_API_KEY")
    const { model } = yield* PipelineConfig
    const client = new OpenAI({ apiKey: Redacted.value(apiKey), maxRetries: 0 })

    return InferenceClient.of({
      complete: (request) =>
        Effect.tryPromise({
          try: (signal) =>
            client.chat.completions.create(
              {
                model,
                temperature: 0,
                messages: [
                  { role: "system", content: request.system },
                  { role: "user", content: request.prompt }
                ],
                response_format: {
                  type: "json_schema",
                  json_schema: { name: request.schemaName, strict: true, schema: request.schema }
                }
              },
              { signal }
            ),
          catch: classifyProviderError
        }).pipe(
          Effect.tap((completion) =>
            Effect.logDebug("Completion received").pipe(
              Effect.annotateLogs({ model, tokens: completion.usage?.total_tokens ?? "unknown" })
            )
          ),
          Effect.flatMap((completion) => {
            const message = completion.choices[0]?.message
            return parseCompletionContent(message?.content, message?.refusal)
          })
        )
    })
  })
)
