import { Writable } from "node:stream";

export type MemorySinkOptions = {
  isTTY?: boolean;
  /** Holds every write this long before acknowledging it. */
  delayMs?: number;
  /** Shared log of `label:chunk` entries, to see ordering across sinks. */
  journal?: string[];
  label?: string;
};

export class MemorySink extends Writable {
  readonly chunks: string[] = [];
  isTTY: boolean;
  private readonly delayMs: number;
  private readonly journal?: string[];
  private readonly label?: string;

  constructor(options: MemorySinkOptions = {}) {
    super({ decodeStrings: false });
    this.isTTY = options.isTTY ?? false;
    this.delayMs = options.delayMs ?? 0;
    this.journal = options.journal;
    this.label = options.label;
  }

  override _write(
    chunk: unknown,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void,
  ): void {
    const text = Buffer.isBuffer(chunk) ? chunk.toString("utf8") : String(chunk);
    this.chunks.push(text);
    this.journal?.push(this.label ? `${this.label}:${text}` : text);
    if (this.delayMs > 0) {
      setTimeout(() => callback(), this.delayMs);
    } else {
      callback();
    }
  }

  text(): string {
    return this.chunks.join("");
  }

  lines(): string[] {
    return this.text()
      .split("\n")
      .filter((line) => line.length > 0);
  }
}

export class FailingSink extends Writable {
  isTTY = false;

  constructor(private readonly code: string = "EACCES") {
    super();
  }

  override _write(
    _chunk: unknown,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void,
  ): void {
    const err: NodeJS.ErrnoException = new Error(`write ${this.code}`);
    err.code = this.code;
    callback(err);
  }
}

export type Deferred<T = void> = {
  promise: Promise<T>;
  resolve: (value: T) => void;
};

export function createDeferred<T = void>(): Deferred<T> {
  let resolve: ((value: T) => void) | undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return {
    promise,
    resolve: (value: T) => resolve?.(value),
  };
}

export const FIXED_NOON = new Date(2024, 0, 2, 12, 0, 0);

export function fixedClock(date: Date = FIXED_NOON): () => Date {
  return () => new Date(date.getTime());
}
