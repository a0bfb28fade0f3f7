export const SCRIPT_TYPES = ["startup", "dormant", "continuous", "static", "stub"] as const;

export type ScriptType = (typeof SCRIPT_TYPES)[number];

export function parseScriptType(name: string): ScriptType | undefined {
  const lowered = name.toLowerCase();
  return SCRIPT_TYPES.find(t => t === lowered);
}

/** Startup, dormant and continuous scripts are scheduled by the engine and return nothing. */
export function hasReturnType(t: ScriptType): boolean {
  return t === "static" || t === "stub";
}

export function takesParameters(t: ScriptType): boolean {
  return t === "static" || t === "stub";
}

export function scriptTypeId(t: ScriptType): number {
  return SCRIPT_TYPES.indexOf(t);
}
