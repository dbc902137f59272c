import { asError } from "../errors.js";

/**
 * Wrap fetch with a time-to-headers timeout and location context for
 * debugging. A caller signal keeps working for the whole body.
 */
export async function timedFetch(
  url: string,
  init: RequestInit & { timeoutMs?: number; where?: string } = {}
): Promise<Response> {
  const { timeoutMs, where, signal: callerSignal, ...rest } = init;
  let timer: ReturnType<typeof setTimeout> | null = null;
  let timedOut = false;
  let signal = callerSignal ?? undefined;

  try {
    if (timeoutMs && timeoutMs > 0) {
      const controller = new AbortController();
      // AbortSignal.any leaves no listener behind on a long-lived caller signal
      signal = callerSignal ? AbortSignal.any([callerSignal, controller.signal]) : controller.signal;
      timer = setTimeout(() => {
        timedOut = true;
        controller.abort();
      }, timeoutMs);
    }
    return await fetch(url, { ...rest, signal });
  } catch (e: unknown) {
    const wrapped = asError(e);
    const tag = timedOut ? "fetch timeout" : "fetch error";
    throw new Error(
      `[${tag}] ${where ?? ""} ${url} -> ${wrapped.name}: ${wrapped.message}`,
      { cause: e },
    );
  } finally {
    if (timer) clearTimeout(timer);
  }
}
