// src/core/types/valueType.ts
// Closed set of value types. Order matters: a type's position is the numeric
// id the host runtime stores in a node.

export const VALUE_TYPES = [
  // compile-time only
  "unparsed",
  "special_form",
  "function_name",
  "passthrough",
  // concrete
  "void",
  "boolean",
  "real",
  "short",
  "long",
  "string",
  "script",
  "trigger_volume",
  "cutscene_flag",
  "cutscene_camera_point",
  "cutscene_title",
  "cutscene_recording",
  "device_group",
  "ai",
  "ai_command_list",
  "starting_profile",
  "conversation",
  "navpoint",
  "hud_message",
  "object_list",
  "sound",
  "effect",
  "damage",
  "looping_sound",
  "animation_graph",
  "actor_variant",
  "damage_effect",
  "object_definition",
  "game_difficulty",
  "team",
  "ai_default_state",
  "actor_type",
  "hud_corner",
  "object",
  "unit",
  "vehicle",
  "weapon",
  "device",
  "scenery",
  "object_name",
  "unit_name",
  "vehicle_name",
  "weapon_name",
  "device_name",
  "scenery_name",
] as const;

export type ValueType = (typeof VALUE_TYPES)[number];

const META_TYPES: ReadonlySet<ValueType> = new Set<ValueType>([
  "unparsed",
  "special_form",
  "function_name",
  "passthrough",
]);

export const NUMERIC_TYPES: ReadonlySet<ValueType> = new Set<ValueType>(["short", "long", "real"]);

const VALUE_TYPE_SET: ReadonlySet<string> = new Set<string>(VALUE_TYPES);

export function isValueType(name: string): name is ValueType {
  return VALUE_TYPE_SET.has(name);
}

export function isMetaType(t: ValueType): boolean {
  return META_TYPES.has(t);
}

export function isNumericType(t: ValueType): boolean {
  return NUMERIC_TYPES.has(t);
}

/**
 * Parse a type as spelled in source (`object_list`). Meta types are not
 * spellable; `passthrough` is reported separately by callers so they can give
 * a better message.
 */
export function parseValueType(name: string): ValueType | undefined {
  const lowered = name.toLowerCase();
  if (!isValueType(lowered)) return undefined;
  if (lowered === "passthrough") return lowered;
  return isMetaType(lowered) ? undefined : lowered;
}

export function valueTypeId(t: ValueType): number {
  return VALUE_TYPES.indexOf(t);
}

/** `object_list` → `object list`, as printed in messages. */
export function valueTypeLabel(t: ValueType): string {
  return t.replaceAll("_", " ");
}
