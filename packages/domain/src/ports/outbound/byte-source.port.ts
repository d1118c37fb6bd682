/**
 * An opened byte stream from the vehicle link (radio bridge, TCP socket,
 * emulator). Frame boundaries are not its concern.
 */
export interface ByteSource {
  readonly description: string;
  /**
   * Fill `buffer` with the next available bytes. Resolves with the number of
   * bytes written; 0 means the stream ended. Rejects with a LinkError when the
   * link fails or `signal` aborts.
   */
  read(buffer: Uint8Array, signal: AbortSignal): Promise<number>;
  close(): Promise<void>;
}

export interface LinkConnector {
  readonly description: string;
  /** Open the underlying link. Rejects with a LinkError on failure or abort. */
  open(signal: AbortSignal): Promise<ByteSource>;
}
