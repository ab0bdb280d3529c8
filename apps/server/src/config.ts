import { z } from 'zod';

export const serverConfigSchema = z.object({
  port: z.coerce.number().int().nonnegative().max(65535).default(3001),
  bodyLimit: z.string().min(1).default('1mb'),
});
export type ServerConfig = z.infer<typeof serverConfigSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = serverConfigSchema.safeParse({
    port: env.PORT || undefined,
    bodyLimit: env.RENDER_BODY_LIMIT || undefined,
  });
  if (!parsed.success) {
    throw new Error(`Invalid server configuration: ${parsed.error.message}`);
  }
  return parsed.data;
}
