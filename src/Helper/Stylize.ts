import type { StyleName, StylizeResult } from "../types/types";

export const STYLES: readonly StyleName[] = ["disney", "pixar", "anime"];

export function parseStyle(value: string | undefined): StyleName | undefined {
  const style = value?.trim().toLowerCase();
  return STYLES.find((candidate) => candidate === style);
}

// No image model is wired in yet, so every request reports that. A real
// integration returns { kind: "stylized", image } here.
export function stylizeImage(_image: Buffer, style: StyleName): StylizeResult {
  return { kind: "not_implemented", style };
}
