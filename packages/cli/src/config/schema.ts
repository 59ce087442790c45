import { z } from 'zod';

const ConfigSchema = z.object({
  api_key: z.string().optional(),
  model: z.string().min(1).optional(),
  temperature: z.number().min(0).max(2).optional(),
  max_tokens: z.number().int().positive().optional(),
  markdown: z.boolean().optional(),
  multiline: z.boolean().optional(),
  endpoint: z.string().url().optional(),
  timeout_ms: z.number().int().positive().optional(),
}).strict();

export type RawConfig = z.infer<typeof ConfigSchema>;

export interface Config {
  /** Empty when neither the file, the environment nor a flag supplies one. */
  api_key: string;
  model: string;
  temperature: number;
  max_tokens?: number;
  /** Render replies as Markdown and ask the model for fenced code and Markdown tables. */
  markdown: boolean;
  multiline: boolean;
  endpoint: string;
  timeout_ms: number;
}

export const ConfigDefaults: Config = {
  api_key: '',
  model: 'gpt-3.5-turbo',
  temperature: 1,
  markdown: true,
  multiline: false,
  endpoint: 'https://api.openai.com/v1',
  timeout_ms: 600_000,
};

/** Written on first run when no config file exists. */
export const CONFIG_TEMPLATE = `api_key: "INSERT API KEY HERE"
model: "gpt-3.5-turbo"
temperature: 1
#max_tokens: 500
markdown: true
#multiline: false
#endpoint: "https://api.openai.com/v1"
`;

export { ConfigSchema };
