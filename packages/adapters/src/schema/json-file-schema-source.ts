import { readFile } from 'node:fs/promises';
import { SchemaError } from '@trackside/domain';
import type { SchemaSource } from '@trackside/domain';

const messageOf = (err: unknown): string => (err instanceof Error ? err.message : String(err));

/** Sensor catalog stored as a JSON document on disk. */
export class JsonFileSchemaSource implements SchemaSource {
  readonly description: string;

  constructor(private readonly path: string) {
    this.description = `file:${path}`;
  }

  async read(): Promise<unknown> {
    let text: string;
    try {
      text = await readFile(this.path, 'utf8');
    } catch (err) {
      throw new SchemaError('invalid_document', null, `cannot read ${this.path}: ${messageOf(err)}`);
    }
    try {
      const doc: unknown = JSON.parse(text);
      return doc;
    } catch (err) {
      throw new SchemaError('invalid_document', null, `${this.path} is not valid JSON: ${messageOf(err)}`);
    }
  }
}
