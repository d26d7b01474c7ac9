import { z } from 'zod';
import messages from './messages.json' with { type: 'json' };

const FieldTypeSchema = z.enum([
  'uint8_t',
  'int8_t',
  'char',
  'uint16_t',
  'int16_t',
  'uint32_t',
  'int32_t',
  'float',
  'uint64_t',
  'int64_t',
  'double'
]);

export type FieldType = z.infer<typeof FieldTypeSchema>;

const FIELD_SIZES: Record<FieldType, number> = {
  uint8_t: 1,
  int8_t: 1,
  char: 1,
  uint16_t: 2,
  int16_t: 2,
  uint32_t: 4,
  int32_t: 4,
  float: 4,
  uint64_t: 8,
  int64_t: 8,
  double: 8
};

const FieldSchema = z.union([
  z.tuple([z.string(), FieldTypeSchema]),
  z.tuple([z.string(), FieldTypeSchema, z.number().int().positive()])
]);

const MessageSchema = z.object({
  name: z.string().min(1),
  crcExtra: z.number().int().min(0).max(255),
  fields: z.array(FieldSchema).min(1)
});

const CatalogueSchema = z.record(z.string().regex(/^\d+$/), MessageSchema);

export interface FieldDefinition {
  name: string;
  type: FieldType;
  arrayLength?: number;
  size: number;
}

export interface MessageDefinition {
  id: number;
  name: string;
  crcExtra: number;
  // wire order
  fields: FieldDefinition[];
  payloadLength: number;
}

export type Catalogue = ReadonlyMap<number, MessageDefinition>;

export function buildCatalogue(source: unknown): Catalogue {
  const parsed = CatalogueSchema.parse(source);
  const catalogue = new Map<number, MessageDefinition>();
  for (const [id, def] of Object.entries(parsed)) {
    const fields = def.fields.map((field): FieldDefinition => {
      const [name, type] = field;
      if (field.length === 3) return { name, type, arrayLength: field[2], size: FIELD_SIZES[type] * field[2] };
      return { name, type, size: FIELD_SIZES[type] };
    });
    catalogue.set(Number(id), {
      id: Number(id),
      name: def.name,
      crcExtra: def.crcExtra,
      fields,
      payloadLength: fields.reduce((sum, f) => sum + f.size, 0)
    });
  }
  return catalogue;
}

export function elementSize(type: FieldType) {
  return FIELD_SIZES[type];
}

export const defaultCatalogue: Catalogue = buildCatalogue(messages);
