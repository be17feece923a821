import * as k8s from "@kubernetes/client-node";

/**
 * Per-request options that hand `signal` to the underlying fetch, so an
 * aborted signal cancels a request already on the wire
 */
export function requestOptions(signal?: AbortSignal): k8s.ConfigurationOptions | undefined {
  if (!signal) {
    return undefined;
  }
  const middleware: k8s.ObservableMiddleware = {
    pre: (context) => {
      context.setSignal(signal);
      return new k8s.Observable(Promise.resolve(context));
    },
    post: (context) => new k8s.Observable(Promise.resolve(context)),
  };
  // Keep the authentication middleware the client was configured with
  return { middleware: [middleware], middlewareMergeStrategy: "append" };
}

/**
 * Settle with `request`, or reject with the signal's reason as soon as it
 * fires, whichever comes first
 */
export function abortable<T>(request: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return request;
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }
    request.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}
