export interface SchemaSource {
  readonly description: string;
  /** Raw, unvalidated schema document. */
  read(): Promise<unknown>;
}
