import { Injectable, Logger } from '@nestjs/common';
import OpenAI from 'openai';

import {
  MalformedResponseError,
  OriginalityError,
  SubsystemUnavailableError,
} from '../../common/errors/originality.errors';
import {
  CompletionConstraints,
  EmbeddingClient,
  TextGenerationClient,
} from '../../originality/collaborators';

const NON_RETRYABLE_STATUSES = new Set([400, 401, 403, 404, 422]);

@Injectable()
export class AzureOpenAiService implements TextGenerationClient, EmbeddingClient {
  private readonly logger = new Logger(AzureOpenAiService.name);
  private client: OpenAI | null = null;
  private readonly deployment: string;
  private readonly embeddingDeployment: string;

  constructor() {
    const endpoint = process.env.AZURE_OPENAI_ENDPOINT;
    const apiKey = process.env.AZURE_OPENAI_KEY;
    const deploymentEnv = process.env.AZURE_OPENAI_DEPLOYMENT;
    const resolved = this.resolveAzureOpenAiConfig(endpoint, deploymentEnv);
    this.deployment = resolved.deployment ?? 'gpt-4o';
    this.embeddingDeployment =
      process.env.AZURE_OPENAI_EMBEDDING_DEPLOYMENT?.trim() || 'text-embedding-3-small';

    if (resolved.baseURL && apiKey) {
      this.client = new OpenAI({
        apiKey,
        baseURL: resolved.baseURL,
        // Callers apply their own timeout and single retry.
        maxRetries: 0,
      });
      this.logger.log(
        `Azure OpenAI client initialized (baseURL: ${resolved.baseURL}, deployment: ${this.deployment}, embeddings: ${this.embeddingDeployment}).`,
      );
    } else {
      this.logger.warn(
        'Azure OpenAI not configured; authorship and retrieval will use heuristic fallback.',
      );
    }
  }

  async complete(prompt: string, constraints: CompletionConstraints): Promise<string> {
    const client = this.requireClient('text generation');
    try {
      const response = await client.chat.completions.create({
        model: this.deployment,
        messages: [
          { role: 'system', content: constraints.system },
          { role: 'user', content: prompt },
        ],
        temperature: constraints.temperature,
        max_tokens: constraints.maxTokens,
        ...(constraints.json ? { response_format: { type: 'json_object' as const } } : {}),
      });
      const content = response.choices[0]?.message?.content;
      if (!content) {
        throw new MalformedResponseError('text generation', '');
      }
      return content;
    } catch (err) {
      throw this.toSubsystemError('text generation', err);
    }
  }

  async embed(text: string): Promise<number[]> {
    const client = this.requireClient('embedding');
    try {
      const response = await client.embeddings.create({
        model: this.embeddingDeployment,
        input: text,
      });
      const embedding = response.data[0]?.embedding;
      if (!embedding || embedding.length === 0) {
        throw new MalformedResponseError('embedding', '');
      }
      return embedding;
    } catch (err) {
      throw this.toSubsystemError('embedding', err);
    }
  }

  private requireClient(subsystem: string): OpenAI {
    if (!this.client) {
      throw new SubsystemUnavailableError(subsystem, 'Azure OpenAI is not configured', false);
    }
    return this.client;
  }

  private toSubsystemError(subsystem: string, err: unknown): OriginalityError {
    if (err instanceof OriginalityError) {
      return err;
    }
    if (err instanceof OpenAI.APIError) {
      const retryable = err.status === undefined || !NON_RETRYABLE_STATUSES.has(err.status);
      this.logger.error(`Azure OpenAI ${subsystem} error (status ${err.status ?? 'n/a'})`, err.message);
      return new SubsystemUnavailableError(subsystem, err.message, retryable);
    }
    this.logger.error(`Azure OpenAI ${subsystem} error`, err);
    return new SubsystemUnavailableError(subsystem, err instanceof Error ? err.message : String(err));
  }

  private resolveAzureOpenAiConfig(
    endpointRaw?: string,
    deploymentRaw?: string,
  ): { baseURL: string | null; deployment: string | null } {
    const endpoint = endpointRaw?.trim();
    const deploymentFromEnv = deploymentRaw?.trim() || null;
    if (!endpoint) {
      return { baseURL: null, deployment: deploymentFromEnv };
    }

    try {
      const parsed = new URL(endpoint);
      const deploymentFromPathMatch = (parsed.pathname || '/').match(/\/openai\/deployments\/([^/]+)/i);
      const deploymentFromPath = deploymentFromPathMatch?.[1]
        ? decodeURIComponent(deploymentFromPathMatch[1])
        : null;

      return {
        baseURL: `${parsed.origin}/openai/v1/`,
        deployment: deploymentFromEnv ?? deploymentFromPath,
      };
    } catch {
      return {
        baseURL: endpoint,
        deployment: deploymentFromEnv,
      };
    }
  }
}
