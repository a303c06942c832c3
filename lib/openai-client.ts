import OpenAI from 'openai';
import type {
  Response,
  ResponseCreateParamsNonStreaming,
  ResponseInputContent
} from 'openai/resources/responses/responses';
import { z } from 'zod';
import { loadPipelineConfig } from '@/config/pipeline';
import { recordUsage } from '@/lib/cost-tracker';
import { parseModelJson } from '@/lib/json';
import { CollaboratorError, MalformedOutputError } from '@/lib/pipeline/errors';

let client: OpenAI | null = null;

export function getOpenAI(): OpenAI {
  const { apiKey } = loadPipelineConfig();
  if (!apiKey) {
    throw new CollaboratorError('OPENAI_API_KEY missing');
  }
  if (!client) {
    client = new OpenAI({ apiKey });
  }
  return client;
}

function reasoningBlockFor(model: string): Pick<ResponseCreateParamsNonStreaming, 'reasoning'> {
  // reasoning effort only applies to the gpt-5 and o-series families
  if (/^(gpt-5|o\d)/i.test(model)) {
    return { reasoning: { effort: loadPipelineConfig().reasoningEffort } };
  }
  return {};
}

/** Wraps an SDK failure so stages report it as a collaborator error with the HTTP status. */
export function toCollaboratorError(err: unknown, what: string): CollaboratorError {
  if (err instanceof CollaboratorError) return err;
  if (err instanceof OpenAI.APIError) {
    return new CollaboratorError(`OpenAI ${what} error ${err.status ?? ''}: ${err.message}`, err.status);
  }
  const message = err instanceof Error ? err.message : String(err);
  return new CollaboratorError(`OpenAI ${what} failed: ${message}`);
}

export type JsonSchemaSpec = {
  name: string;
  schema: Record<string, unknown>;
  strict?: boolean;
};

export type InputFile = {
  filename: string;
  mimeType: string;
  data: Buffer;
};

export type JsonCallParams<T> = {
  system: string;
  user: string;
  schema: JsonSchemaSpec;
  parser: z.ZodType<T, z.ZodTypeDef, unknown>;
  files?: InputFile[];
  temperature?: number;
  model?: string;
  agent?: string;
  signal?: AbortSignal;
};

export async function callJson<T>({
  system,
  user,
  schema,
  parser,
  files = [],
  temperature = 0.2,
  model = loadPipelineConfig().model,
  agent = 'unknown',
  signal
}: JsonCallParams<T>): Promise<T> {
  const openai = getOpenAI();

  const userContent: ResponseInputContent[] = [
    { type: 'input_text', text: user },
    ...files.map(
      (file): ResponseInputContent => ({
        type: 'input_file',
        filename: file.filename,
        file_data: `data:${file.mimeType};base64,${file.data.toString('base64')}`
      })
    )
  ];

  const buildPayload = (includeTemperature: boolean): ResponseCreateParamsNonStreaming => ({
    model,
    input: [
      { role: 'system', content: system },
      { role: 'user', content: userContent }
    ],
    text: {
      format: {
        type: 'json_schema',
        name: schema.name,
        schema: schema.schema,
        strict: schema.strict ?? true
      }
    },
    ...reasoningBlockFor(model),
    ...(includeTemperature ? { temperature } : {})
  });

  console.info(`[LLM][agent=${agent}] callJson model=${model} schema=${schema.name} files=${files.length}`);
  let res: Response;
  try {
    res = await openai.responses.create(buildPayload(true), { signal });
  } catch (err) {
    // some models reject temperature; retry once without it
    if (err instanceof OpenAI.APIError && /Unsupported parameter: 'temperature'/.test(err.message)) {
      try {
        res = await openai.responses.create(buildPayload(false), { signal });
      } catch (err2) {
        throw toCollaboratorError(err2, 'responses');
      }
    } else {
      throw toCollaboratorError(err, 'responses');
    }
  }

  if (res.usage) {
    recordUsage(model, res.usage, agent);
    console.info(
      `[LLM][agent=${agent}] done tokens in=${res.usage.input_tokens} out=${res.usage.output_tokens} model=${model}`
    );
  }

  if (res.status === 'incomplete') {
    const reason = res.incomplete_details?.reason ?? 'unknown';
    throw new MalformedOutputError(`${agent} returned incomplete output (${reason})`);
  }

  const text = res.output_text;
  if (!text) {
    throw new MalformedOutputError(`${agent} returned an empty response`);
  }

  const parsed = parser.safeParse(parseModelJson(text));
  if (!parsed.success) {
    throw new MalformedOutputError(`${agent} returned JSON that does not match ${schema.name}: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  }
  return parsed.data;
}
