import { extractErrorCode, TraceError } from "../tracer/errors.js";
import type { TraceDestination } from "../tracer/types.js";

export type SafeStreamWriterOptions = {
  onBrokenPipe?: (err: NodeJS.ErrnoException, stream: TraceDestination) => void;
  onStreamError?: (err: Error, stream: TraceDestination) => void;
};

export type SafeStreamWriter = {
  /** Resolves once the destination accepted `text`; rejects with `DESTINATION_UNAVAILABLE`. */
  write: (stream: TraceDestination, text: string) => Promise<void>;
  isClosed: (stream: TraceDestination) => boolean;
  reset: () => void;
};

function isBrokenPipeError(err: unknown): err is NodeJS.ErrnoException {
  const code = extractErrorCode(err);
  return code === "EPIPE" || code === "EIO";
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export function createSafeStreamWriter(options: SafeStreamWriterOptions = {}): SafeStreamWriter {
  let closed = new WeakSet<TraceDestination>();
  const watched = new WeakSet<TraceDestination>();

  const noteBrokenPipe = (err: NodeJS.ErrnoException, stream: TraceDestination) => {
    if (closed.has(stream)) return;
    closed.add(stream);
    options.onBrokenPipe?.(err, stream);
  };

  const handleError = (err: unknown, stream: TraceDestination): TraceError => {
    if (isBrokenPipeError(err)) {
      noteBrokenPipe(err, stream);
    }
    const cause = toError(err);
    return new TraceError("DESTINATION_UNAVAILABLE", `Write failed: ${cause.message}`, { cause });
  };

  // Writable streams also emit failed writes as "error" events, which would
  // otherwise crash the process when nobody listens.
  const watch = (stream: TraceDestination) => {
    if (watched.has(stream)) return;
    watched.add(stream);
    stream.on("error", (err: Error) => {
      if (isBrokenPipeError(err)) {
        noteBrokenPipe(err, stream);
        return;
      }
      options.onStreamError?.(err, stream);
    });
  };

  const write = (stream: TraceDestination, text: string): Promise<void> => {
    if (closed.has(stream)) {
      return Promise.reject(
        new TraceError("DESTINATION_UNAVAILABLE", "Destination closed after a broken pipe"),
      );
    }
    if (stream.destroyed || stream.writableEnded || stream.writable === false) {
      return Promise.reject(new TraceError("DESTINATION_UNAVAILABLE", "Destination is closed"));
    }
    watch(stream);
    return new Promise<void>((resolve, reject) => {
      try {
        stream.write(text, (err?: Error | null) => {
          if (err) {
            reject(handleError(err, stream));
            return;
          }
          resolve();
        });
      } catch (err) {
        reject(handleError(err, stream));
      }
    });
  };

  return {
    write,
    isClosed: (stream) => closed.has(stream),
    reset: () => {
      closed = new WeakSet();
    },
  };
}
