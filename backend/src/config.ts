import { serverConfigSchema } from "./schemas";

export interface ServerConfig {
  port: number;
  host: string;
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ServerConfig => {
  const parsed = serverConfigSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid server configuration (${details})`);
  }
  return { port: parsed.data.PORT, host: parsed.data.HOST };
};
