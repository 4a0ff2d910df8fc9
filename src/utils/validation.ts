import { z } from 'zod';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const AppEnvSchema = z.object({
  API_PORT: z.coerce.number().int().positive().max(65535).default(3001),
  API_TOKEN: z.string().min(1).optional(),
  CONFIG_DIR: z.string().min(1).optional(),
  ASSISTANT_SECRET: z.string().min(1).optional(),
  LOG_LEVEL: LogLevelSchema.default('info'),
  MAX_TOOL_ITERATIONS: z.coerce.number().int().min(1).max(20).default(5),
  OPENAI_BASE_URL: z.string().url().optional(),
  ANTHROPIC_BASE_URL: z.string().url().optional(),
  GOOGLE_BASE_URL: z.string().url().optional(),
  XAI_BASE_URL: z.string().url().optional(),
  DEEPSEEK_BASE_URL: z.string().url().optional(),
});

export type AppEnv = z.infer<typeof AppEnvSchema>;

export const ToolArgumentsSchema = z.record(z.unknown());

export const ToolCallSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  arguments: z.string(),
});

export const ChatMessageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant', 'tool']),
  content: z.string(),
  toolCalls: z.array(ToolCallSchema).optional(),
  toolCallId: z.string().optional(),
  toolName: z.string().optional(),
});

export const ChatRequestSchema = z.object({
  messages: z.array(ChatMessageSchema).min(1),
  authorizeDestructive: z.boolean().default(false),
  systemPrompt: z.string().min(1).optional(),
});

export const CredentialRequestSchema = z.object({
  apiKey: z.string().min(1),
});

export const ValidateCredentialRequestSchema = z.object({
  apiKey: z.string().min(1).optional(),
});

export const ProviderSelectionSchema = z.object({
  providerId: z.string().min(1),
  model: z.string().min(1).optional(),
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().positive().optional(),
});

/** Renders the first zod issue as `field: message`. */
export function describeIssue(error: z.ZodError): { field: string; message: string } {
  const issue = error.issues[0];
  const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'body';
  return { field, message: issue ? `${field}: ${issue.message}` : 'Invalid request body' };
}
