export const RUBRIC_WEIGHT = 0.6;
export const SEMANTIC_WEIGHT = 0.4;

const round = (value: number): number => Math.round(value * 1e10) / 1e10;

/** 0.6 x rubric + 0.4 x semantic, both on the 0-5 scale. */
export const fuse = (rubric: number, semantic: number): number =>
  round(RUBRIC_WEIGHT * rubric + SEMANTIC_WEIGHT * semantic);
