import { z } from 'zod';
import {
  SchemaError,
  FRAME_HEADER_LENGTH,
  FRAME_TIMESTAMP_LENGTH,
} from '@trackside/domain';
import type {
  EmulationRule,
  FieldSlot,
  FrameLayout,
  Schema,
  SensorDefinition,
  SchemaErrorKind,
} from '@trackside/domain';
import { FIELD_TYPES, fitsField, toRaw } from '../codec/field-types.js';

const SENSOR_ID_PATTERN = /^[A-Za-z_][A-Za-z0-9_-]*$/;
const MAX_PAYLOAD_LENGTH = 0xffff;

// ---------------------------------------------------------------------------
// Document shape (the sensor catalog as stored on disk)
// ---------------------------------------------------------------------------

const emulationRuleSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('sine'),
    amplitude: z.number(),
    offset: z.number(),
    period: z.number().positive(),
    phase: z.number().optional(),
  }),
  z.object({
    kind: z.literal('cosine'),
    amplitude: z.number(),
    offset: z.number(),
    period: z.number().positive(),
    phase: z.number().optional(),
  }),
  z.object({ kind: z.literal('uniform'), low: z.number(), high: z.number() }),
  z.object({ kind: z.literal('constant'), value: z.number() }),
  z.object({
    kind: z.literal('linear'),
    slope: z.number(),
    intercept: z.number(),
    period: z.number().int().positive().optional(),
  }),
]);

const sensorBodySchema = z.object({
  name: z.string().min(1),
  units: z.string().default(''),
  group: z.string().min(1),
  enable: z.boolean().default(true),
  min: z.number(),
  max: z.number(),
  on_dash: z.boolean().default(false),
  type: z.enum(['u8', 'i8', 'u16', 'i16', 'u32', 'i32', 'f32', 'f64']),
  scale: z.number().positive().default(1),
  emulation_rule: emulationRuleSchema.optional(),
});

// Sensors may be declared as an id-keyed object or as a list carrying `id`.
const sensorListSchema = z.array(sensorBodySchema.extend({ id: z.string() })).min(1);
const sensorRecordSchema = z.record(sensorBodySchema);

const schemaDocumentSchema = z.object({
  version: z.string().min(1),
  startByte: z.number().int().min(0).max(0xff).default(0x01),
  frameId: z.number().int().min(0).max(0xff).default(0),
  sensors: z.unknown(),
});

type SensorBody = z.output<typeof sensorBodySchema>;

// ---------------------------------------------------------------------------
// Schema implementation
// ---------------------------------------------------------------------------

class SensorSchema implements Schema {
  private readonly byId: ReadonlyMap<string, SensorDefinition>;
  private readonly enabledSensors: readonly SensorDefinition[];
  private readonly grouped: ReadonlyMap<string, readonly SensorDefinition[]>;

  constructor(
    readonly version: string,
    readonly startByte: number,
    readonly frameId: number,
    private readonly sensors: readonly SensorDefinition[],
    readonly layout: FrameLayout,
  ) {
    this.byId = new Map(sensors.map((s) => [s.id, s]));
    this.enabledSensors = sensors.filter((s) => s.enable);

    const grouped = new Map<string, SensorDefinition[]>();
    for (const sensor of this.enabledSensors) {
      const members = grouped.get(sensor.group) ?? [];
      members.push(sensor);
      grouped.set(sensor.group, members);
    }
    this.grouped = grouped;
  }

  lookup(id: string): SensorDefinition | undefined {
    return this.byId.get(id);
  }

  all(): readonly SensorDefinition[] {
    return this.sensors;
  }

  enabled(): readonly SensorDefinition[] {
    return this.enabledSensors;
  }

  groups(): ReadonlyMap<string, readonly SensorDefinition[]> {
    return this.grouped;
  }
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

function fail(kind: SchemaErrorKind, sensorId: string | null, detail: string): never {
  throw new SchemaError(kind, sensorId, detail);
}

function fromZodError(err: z.ZodError, prefix: Array<string | number> = [], sensorIds: unknown[] = []): SchemaError {
  const issue = err.issues[0];
  const path = [...prefix, ...(issue?.path ?? [])];
  // sensors.<id>.field (record form) or sensors.<index>.field (list form)
  const sensorKey = path[0] === 'sensors' ? path[1] : undefined;
  const listedId = typeof sensorKey === 'number' ? sensorIds[sensorKey] : sensorKey;
  const sensorId = typeof listedId === 'string' ? listedId : null;
  const kind: SchemaErrorKind = path.includes('emulation_rule') ? 'invalid_rule' : 'invalid_document';
  const where = path.length > 0 ? `${path.join('.')}: ` : '';
  return new SchemaError(kind, sensorId, `${where}${issue?.message ?? 'invalid schema document'}`);
}

function toDefinition(id: string, body: SensorBody): SensorDefinition {
  if (!SENSOR_ID_PATTERN.test(id)) {
    fail('invalid_id', id, `sensor id must match ${SENSOR_ID_PATTERN.source}`);
  }
  if (body.min > body.max) {
    fail('invalid_range', id, `min ${body.min} is greater than max ${body.max}`);
  }
  for (const bound of [body.min, body.max]) {
    if (!fitsField(body.type, toRaw(body.type, body.scale, bound))) {
      fail('invalid_range', id, `${bound} cannot be represented as ${body.type} with scale ${body.scale}`);
    }
  }

  const emulation: EmulationRule = body.emulation_rule ?? { kind: 'constant', value: body.min };
  if (emulation.kind === 'uniform' && emulation.low > emulation.high) {
    fail('invalid_rule', id, `uniform low ${emulation.low} is greater than high ${emulation.high}`);
  }

  return {
    id,
    name: body.name,
    units: body.units,
    group: body.group,
    enable: body.enable,
    min: body.min,
    max: body.max,
    onDash: body.on_dash,
    type: body.type,
    scale: body.scale,
    emulation,
  };
}

export function computeLayout(sensors: readonly SensorDefinition[]): FrameLayout {
  const bitfieldOffset = FRAME_HEADER_LENGTH;
  const bitfieldLength = Math.ceil(sensors.length / 8);
  const timestampOffset = bitfieldOffset + bitfieldLength;

  let offset = timestampOffset + FRAME_TIMESTAMP_LENGTH;
  const fields: FieldSlot[] = sensors.map((sensor, index) => {
    const width = FIELD_TYPES[sensor.type].width;
    const slot: FieldSlot = {
      sensorId: sensor.id,
      index,
      offset,
      width,
      rawMin: toRaw(sensor.type, sensor.scale, sensor.min),
      rawMax: toRaw(sensor.type, sensor.scale, sensor.max),
    };
    offset += width;
    return slot;
  });

  return {
    headerLength: FRAME_HEADER_LENGTH,
    bitfieldOffset,
    bitfieldLength,
    timestampOffset,
    fields,
    payloadLength: offset - FRAME_HEADER_LENGTH,
  };
}

/**
 * Validate a raw schema document and build an immutable Schema from it.
 * Throws SchemaError on the first violation; nothing is partially applied.
 */
export function loadSchema(source: unknown): Schema {
  const parsed = schemaDocumentSchema.safeParse(source);
  if (!parsed.success) throw fromZodError(parsed.error);
  const doc = parsed.data;

  let entries: Array<[string, SensorBody]>;
  if (Array.isArray(doc.sensors)) {
    const listed = sensorListSchema.safeParse(doc.sensors);
    if (!listed.success) {
      const ids = doc.sensors.map((entry: unknown) =>
        typeof entry === 'object' && entry !== null && 'id' in entry ? entry.id : undefined,
      );
      throw fromZodError(listed.error, ['sensors'], ids);
    }
    entries = listed.data.map(({ id, ...body }): [string, SensorBody] => [id, body]);
  } else {
    const keyed = sensorRecordSchema.safeParse(doc.sensors);
    if (!keyed.success) throw fromZodError(keyed.error, ['sensors']);
    entries = Object.entries(keyed.data);
  }

  if (entries.length === 0) fail('invalid_document', null, 'schema declares no sensors');

  const seen = new Set<string>();
  const sensors = entries.map(([id, body]) => {
    if (id.length === 0) fail('invalid_id', null, 'sensor id must not be empty');
    if (seen.has(id)) fail('duplicate_id', id, 'sensor id declared more than once');
    seen.add(id);
    return toDefinition(id, body);
  });

  const layout = computeLayout(sensors);
  if (layout.payloadLength > MAX_PAYLOAD_LENGTH) {
    fail('invalid_layout', null, `payload of ${layout.payloadLength} bytes exceeds ${MAX_PAYLOAD_LENGTH}`);
  }

  return new SensorSchema(doc.version, doc.startByte, doc.frameId, Object.freeze(sensors), layout);
}
