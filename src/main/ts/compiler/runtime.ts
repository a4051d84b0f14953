import { BUILTIN_NAMES } from "../common/builtins.js";

/** Names the preamble declares with `let`, so programs may rebind them. */
export const PREAMBLE_BINDINGS: readonly string[] = BUILTIN_NAMES;

/**
 * Helpers every generated program starts with. `$$` names cannot collide
 * with source identifiers, which never contain `$`.
 */
export const RUNTIME_PREAMBLE: readonly string[] = [
  "const $$nested = (v) => typeof v === \"string\" ? JSON.stringify(v) : $$show(v);",
  "const $$show = (v) => v === null ? \"null\" : Array.isArray(v) ? \"[\" + v.map($$nested).join(\", \") + \"]\" : typeof v === \"function\" ? (v.name ? \"<fn \" + v.name + \">\" : \"<fn>\") : typeof v === \"object\" ? \"{\" + Object.entries(v).map(([k, x]) => k + \": \" + $$nested(x)).join(\", \") + \"}\" : String(v);",
  "const $$unimplemented = (feature) => { throw new Error(feature + \" expressions are not yet implemented\"); };",
  "let print = (...values) => { console.log(values.map($$show).join(\" \")); return null; };",
  "let len = (v) => typeof v === \"string\" || Array.isArray(v) ? v.length : Object.keys(v).length;",
  "let str = (v) => $$show(v);",
  "let num = (v) => { const n = typeof v === \"number\" ? v : typeof v === \"string\" && v.trim() !== \"\" ? Number(v) : NaN; if (Number.isNaN(n)) throw new Error(\"num: cannot convert \" + $$nested(v) + \" to number\"); return n; };",
  "let type = (v) => v === null ? \"null\" : Array.isArray(v) ? \"array\" : typeof v === \"boolean\" ? \"bool\" : typeof v === \"object\" ? \"record\" : typeof v;",
];
