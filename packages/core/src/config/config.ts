import { z } from "zod";

const positiveInt = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((v) => Number(v))
    .pipe(z.number().int().positive());

const EnvSchema = z.object({
  // Cluster access; unset means in-cluster service account or ~/.kube/config
  KUBECONFIG: z.string().optional(),

  // Ephemeral pod polling
  POD_POLL_INTERVAL_MS: positiveInt("1000"),
  POD_TIMEOUT_MS: positiveInt("600000"),

  // Projected service account tokens
  TOKEN_EXPIRATION_SECONDS: positiveInt("3600").pipe(
    z.number().min(600, "TOKEN_EXPIRATION_SECONDS must be at least 600"),
  ),

  CHECKER_IMAGE: z.string().min(1).default("cluster-preflight-pod:latest"),
  CHECKER_IMAGE_PULL_POLICY: z.enum(["Always", "IfNotPresent", "Never"]).default("Always"),
  GCLOUD_IMAGE: z.string().min(1).default("google/cloud-sdk:latest"),

  DB_CONNECT_TIMEOUT_MS: positiveInt("10000"),
});

export type EngineConfig = z.infer<typeof EnvSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join(", ");
    throw new Error(`Invalid environment: ${msg}`);
  }
  return parsed.data;
}
