/**
 * Codec Module - Field Layout Registry
 *
 * Loads the per-opcode field tables from data/frame-layouts.json and
 * resolves byte offsets. The file sits two directories above this module
 * in both src/ and dist/.
 */
import { readFileSync } from "node:fs";
import {
  type CompiledLayout,
  FIELD_SIZES,
  type FrameLayout,
  FrameLayoutFileSchema,
  OPCODES,
  RawStatusFieldsSchema,
  DeviceFeatureFieldsSchema,
} from "./schema.js";

const LAYOUT_FILE = new URL("../../data/frame-layouts.json", import.meta.url);

export type LayoutRegistry = ReadonlyMap<number, CompiledLayout>;

/**
 * Resolve byte offsets for a layout.
 */
export function compileLayout(layout: FrameLayout): CompiledLayout {
  let offset = 0;
  const fields = layout.fields.map((field) => {
    const compiled = { ...field, offset };
    offset += FIELD_SIZES[field.type];
    return compiled;
  });

  return { opcode: layout.opcode, name: layout.name, fields, length: offset };
}

/**
 * Names a typed record declares that the layout does not provide.
 */
function missingFields(layout: CompiledLayout, declared: readonly string[]): string[] {
  const present = new Set(layout.fields.map((f) => f.name));
  return declared.filter((name) => !present.has(name));
}

/**
 * Validate raw layout data and build the registry.
 *
 * @throws Error when the data does not match the schema, repeats an opcode
 * or a field name, or omits a declared status/device-info field
 */
export function buildLayoutRegistry(data: unknown): LayoutRegistry {
  const parsed = FrameLayoutFileSchema.safeParse(data);
  if (!parsed.success) {
    throw new Error(`Invalid frame layouts: ${parsed.error.message}`);
  }

  const registry = new Map<number, CompiledLayout>();

  for (const layout of parsed.data.layouts) {
    if (registry.has(layout.opcode)) {
      throw new Error(`Duplicate frame layout for opcode ${layout.opcode}`);
    }
    const names = new Set(layout.fields.map((f) => f.name));
    if (names.size !== layout.fields.length) {
      throw new Error(`Duplicate field name in layout ${layout.name}`);
    }
    registry.set(layout.opcode, compileLayout(layout));
  }

  const required: ReadonlyArray<readonly [number, readonly string[]]> = [
    [OPCODES.GetStatus, RawStatusFieldsSchema.keyof().options],
    [OPCODES.GetDeviceInfo, DeviceFeatureFieldsSchema.keyof().options],
  ];

  for (const [opcode, declared] of required) {
    const layout = registry.get(opcode);
    if (!layout) {
      throw new Error(`Missing frame layout for opcode ${opcode}`);
    }
    const missing = missingFields(layout, declared);
    if (missing.length > 0) {
      throw new Error(`Layout ${layout.name} lacks fields: ${missing.join(", ")}`);
    }
  }

  return registry;
}

let registry: LayoutRegistry | null = null;

/**
 * The layout registry, read from disk on first use.
 */
export function getLayoutRegistry(): LayoutRegistry {
  if (!registry) {
    const raw: unknown = JSON.parse(readFileSync(LAYOUT_FILE, "utf8"));
    registry = buildLayoutRegistry(raw);
  }
  return registry;
}

/**
 * Layout for an opcode, or undefined when the opcode has no fixed layout.
 */
export function getLayout(opcode: number): CompiledLayout | undefined {
  return getLayoutRegistry().get(opcode);
}
