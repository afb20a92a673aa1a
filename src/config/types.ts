import { z } from 'zod';

export const TransportSchema = z.enum(['cli', 'sdk']);
export type Transport = z.infer<typeof TransportSchema>;

export const HarnessConfigSchema = z.object({
  cli: z.object({
    /** external MCP client executable */
    command: z.string().min(1),
    /** MCP client config file passed as --config */
    mcp_config: z.string().min(1),
    /** server entry in the MCP config, passed as --mcp-name */
    mcp_name: z.string().min(1),
    transport: TransportSchema,
    timeout_ms: z.number().int().positive(),
  }),
  output: z.object({
    iso_timestamps: z.boolean(),
  }),
  docker: z.object({
    image: z.string().min(1),
    extra_images: z.array(z.string().min(1)),
    context: z.string().min(1),
  }),
  tests: z.object({
    runner: z.string().min(1),
    runner_args: z.array(z.string()),
    env_file: z.string().min(1),
  }),
});

export type HarnessConfig = z.infer<typeof HarnessConfigSchema>;
