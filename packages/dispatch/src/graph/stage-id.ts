/**
 * Reference-identity tokens for stage objects.
 * Two structurally equal stages get different ids unless they are the same object.
 */

import type { StageId } from "./types.js";

const stageIds = new WeakMap<object, StageId>();
let nextStageId = 1;

/**
 * Get the identity token of a stage, assigning one on first sight
 */
export function getStageId(stage: object): StageId {
  const existing = stageIds.get(stage);
  if (existing !== undefined) {
    return existing;
  }
  const id = nextStageId++;
  stageIds.set(stage, id);
  return id;
}
