import { errorMessage } from "@/lib/errors";

export type ServiceHealth = {
  ok: boolean;
  latency_ms: number;
  message?: string;
};

export async function timedHealthCheck(check: () => Promise<unknown>): Promise<ServiceHealth> {
  const start = Date.now();
  try {
    await check();
    return { ok: true, latency_ms: Date.now() - start };
  } catch (err) {
    return {
      ok: false,
      latency_ms: Date.now() - start,
      message: errorMessage(err),
    };
  }
}
