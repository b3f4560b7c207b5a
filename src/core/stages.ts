/** Pipeline stages in their fixed execution order */
export const STAGES = ["config", "build", "mkimg", "flash"] as const;

export type Stage = (typeof STAGES)[number];

/** Keywords that run a single stage and skip everything before it */
export const SINGLE_STAGE_KEYWORDS = [":build", ":mkimg", ":flash"] as const;

export type SingleStageKeyword = (typeof SINGLE_STAGE_KEYWORDS)[number];
export type StageKeyword = Stage | SingleStageKeyword;

export const STAGE_KEYWORDS: readonly StageKeyword[] = [...STAGES, ...SINGLE_STAGE_KEYWORDS];

const SINGLE_STAGE_TARGET: Record<SingleStageKeyword, Stage> = {
  ":build": "build",
  ":mkimg": "mkimg",
  ":flash": "flash",
};

export function isStage(value: string): value is Stage {
  return STAGES.some((stage) => stage === value);
}

export function isStageKeyword(value: string): value is StageKeyword {
  return STAGE_KEYWORDS.some((keyword) => keyword === value);
}

/**
 * Stages selected by a keyword. A bare stage runs every stage up to and
 * including itself; a ':'-prefixed one runs only that stage.
 */
export function resolveStages(keyword: StageKeyword): Stage[] {
  if (isStage(keyword)) {
    return STAGES.slice(0, STAGES.indexOf(keyword) + 1);
  }
  return [SINGLE_STAGE_TARGET[keyword]];
}

/**
 * Whether a keyword takes model/name/toggle tokens. `:build` and `:flash`
 * work on whatever configuration is already in the tree.
 */
export function acceptsConfigTokens(keyword: StageKeyword): boolean {
  return isStage(keyword) || keyword === ":mkimg";
}
