export const DEFAULT_ENTRY_POINT = 'GeneratedScene';

// `class Name(Base, other.Base2):` with the base list allowed to span lines.
const CLASS_DEF_RE = /^[ \t]*class[ \t]+([A-Za-z_]\w*)[ \t]*\(([^)]*)\)[ \t]*:/gm;

function baseNames(baseList: string): string[] {
  return baseList
    .split(',')
    .map((base) => base.trim())
    .filter((base) => base.length > 0 && !base.includes('='))
    .map((base) => base.split('.').pop() ?? base);
}

/**
 * Names of classes whose bases include a `*Scene*` type, in source order.
 * Text-level scan: classes inside string literals are not excluded.
 */
export function findSceneClasses(code: string): string[] {
  const names: string[] = [];
  for (const match of code.matchAll(CLASS_DEF_RE)) {
    if (baseNames(match[2]).some((base) => base.includes('Scene'))) {
      names.push(match[1]);
    }
  }
  return names;
}

/**
 * Pick the render entry point: the first scene class from the top of the
 * file, or {@link DEFAULT_ENTRY_POINT} when there is none.
 */
export function detectEntryPoint(code: string, fallback = DEFAULT_ENTRY_POINT): string {
  return findSceneClasses(code)[0] ?? fallback;
}
