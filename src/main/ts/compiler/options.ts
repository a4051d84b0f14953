import { err, ok, type Result } from "../common/result.js";

/**
 * `es2020` emits a plain script; `esm` additionally marks top-level exported
 * declarations with `export`.
 */
export const EMISSION_PROFILES = ["es2020", "esm"] as const;

export type EmissionProfile = (typeof EMISSION_PROFILES)[number];

export interface CompileOptions {
  profile?: string;
  /** Accepted for compatibility; output is not minified. */
  minify?: boolean;
  /** Accepted for compatibility; no source map is produced. */
  sourceMap?: boolean;
  /** Emit a `"use strict";` directive. */
  strict?: boolean;
}

export interface ResolvedCompileOptions {
  profile: EmissionProfile;
  minify: boolean;
  sourceMap: boolean;
  strict: boolean;
}

export const DEFAULT_COMPILE_OPTIONS: ResolvedCompileOptions = {
  profile: "es2020",
  minify: false,
  sourceMap: false,
  strict: true,
};

function isEmissionProfile(name: string): name is EmissionProfile {
  return EMISSION_PROFILES.some((profile) => profile === name);
}

export function resolveCompileOptions(
  options: CompileOptions = {}
): Result<ResolvedCompileOptions, string> {
  const profile = options.profile ?? DEFAULT_COMPILE_OPTIONS.profile;
  if (!isEmissionProfile(profile)) {
    return err(`unknown emission profile: ${profile}`);
  }

  return ok({
    profile,
    minify: options.minify ?? DEFAULT_COMPILE_OPTIONS.minify,
    sourceMap: options.sourceMap ?? DEFAULT_COMPILE_OPTIONS.sourceMap,
    strict: options.strict ?? DEFAULT_COMPILE_OPTIONS.strict,
  });
}
