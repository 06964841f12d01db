import OpenAI from 'openai';
import type { ChatCompletion, ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import { z } from 'zod';
import type { AnnotationSummary, ConversationMetadata, Transcript } from '../../shared/conversation';
import { ProviderError, getErrorMessage } from '../../server/errors';
import { isAbortError } from './resilienceUtils';
import { providerLogger } from './structuredLogger';

/**
 * Produces the opaque annotation summary stored alongside phrase matches.
 * Implementations must honour `signal` where their transport allows it.
 */
export interface AnalysisProvider {
  analyze(transcript: Transcript, metadata: ConversationMetadata, signal?: AbortSignal): Promise<AnnotationSummary>;
}

// The slice of the OpenAI client this provider calls
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(
        body: ChatCompletionCreateParamsNonStreaming,
        options?: { signal?: AbortSignal },
      ): Promise<ChatCompletion>;
    };
  };
}

export const CUSTOMER_SENTIMENTS = ['positive', 'neutral', 'negative'] as const;

const analysisResponseSchema = z.object({
  summary: z.string(),
  customerSentiment: z.enum(CUSTOMER_SENTIMENTS).catch('neutral'),
  topics: z.array(z.string()).default([]),
});

const SYSTEM_PROMPT = `You are a contact centre quality analyst.
Read the conversation transcript between an AGENT and a CUSTOMER and describe it.

Respond with a JSON object only, no other text:
{
  "summary": "Brief 1-2 sentence summary of the conversation",
  "customerSentiment": "positive|neutral|negative",
  "topics": ["Main topics raised by the customer"]
}`;

export function renderTranscript(transcript: Transcript): string {
  return transcript.turns.map(turn => `[${turn.index}] ${turn.speakerRole}: ${turn.text}`).join('\n');
}

export interface OpenAiAnalysisProviderOptions {
  model: string;
  apiKey?: string;
  client?: ChatCompletionsClient;
}

export class OpenAiAnalysisProvider implements AnalysisProvider {
  private readonly client: ChatCompletionsClient;
  private readonly model: string;

  constructor(options: OpenAiAnalysisProviderOptions) {
    this.client = options.client ?? new OpenAI({ apiKey: options.apiKey });
    this.model = options.model;
  }

  async analyze(transcript: Transcript, metadata: ConversationMetadata, signal?: AbortSignal): Promise<AnnotationSummary> {
    const conversationId = transcript.conversationId;
    const startTime = Date.now();
    const userPrompt = `Agent: ${metadata.agent_id}\n\nTranscript:\n${renderTranscript(transcript)}`;

    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [
            { role: 'system', content: SYSTEM_PROMPT },
            { role: 'user', content: userPrompt },
          ],
          temperature: 0.3,
          response_format: { type: 'json_object' },
        },
        { signal },
      );

      const content = response.choices[0]?.message?.content;
      if (!content) {
        throw new ProviderError('Analysis response had no content', { conversationId });
      }

      const parsed = analysisResponseSchema.safeParse(JSON.parse(content));
      if (!parsed.success) {
        throw new ProviderError(`Analysis response malformed: ${getErrorMessage(parsed.error)}`, {
          conversationId,
          cause: parsed.error,
        });
      }

      providerLogger.providerCall({ conversationId, model: this.model, duration: Date.now() - startTime, success: true });

      return { ...parsed.data, model: response.model || this.model };
    } catch (error) {
      providerLogger.providerCall({ conversationId, model: this.model, duration: Date.now() - startTime, success: false });

      if (error instanceof ProviderError || isAbortError(error, signal)) {
        throw error;
      }
      throw new ProviderError(`Analysis request failed: ${getErrorMessage(error)}`, { conversationId, cause: error });
    }
  }
}
