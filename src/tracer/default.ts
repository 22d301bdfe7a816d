import { createTracer, type Tracer, type TracerOptions } from "./tracer.js";

let defaultTracer: Tracer | null = null;

/** Process-wide tracer for callers that want a single shared instance. */
export function getDefaultTracer(options?: TracerOptions): Tracer {
  if (!defaultTracer) {
    defaultTracer = createTracer(options);
  }
  return defaultTracer;
}

export async function resetDefaultTracer(): Promise<void> {
  const tracer = defaultTracer;
  defaultTracer = null;
  if (tracer?.isInitialized()) {
    await tracer.teardown();
  }
}
