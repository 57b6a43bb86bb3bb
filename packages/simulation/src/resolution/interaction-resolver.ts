import type { ResolutionFile, ResolutionStage } from "../config/schemas.js";
import type { SelectedInteraction } from "../selector/interaction-selector.js";
import type { Character, Roster } from "../types.js";
import type { SkillCheck, SkillCheckRequest, SkillCheckResult } from "./skill-check.js";

export type OutcomeTier = "on_great_success" | "on_success" | "on_failure";

export interface StageResult {
  stageId: string;
  actor: string;
  /** Skill used, or `null` when the check fell back to an attribute. */
  skill: string | null;
  check: SkillCheckResult;
}

export interface ResolutionResult {
  interaction: string;
  domain: string;
  participants: string[];
  stages: StageResult[];
  /** Stage margins combined by the configured aggregate. */
  margin: number;
  success: boolean;
  greatSuccess: boolean;
  fumble: boolean;
  /** A stage failed with `on_failure: "stop"`; later stages did not run. */
  stopped: boolean;
  tier: OutcomeTier;
}

export interface InteractionResolverOptions {
  resolution: ResolutionFile;
  skillCheck: SkillCheck;
}

/** Layer 3: runs an interaction's staged checks and classifies the result. */
export class InteractionResolver {
  private readonly rules: ResolutionFile;
  private readonly skillCheck: SkillCheck;

  constructor(options: InteractionResolverOptions) {
    this.rules = options.resolution;
    this.skillCheck = options.skillCheck;
  }

  resolve(selected: SelectedInteraction, roster: Roster): ResolutionResult {
    const base = {
      interaction: selected.name,
      domain: selected.domain,
      participants: [...selected.participants],
    };
    const definition = this.rules.interaction_resolutions[selected.name];
    if (!definition) {
      // Interactions without checks always succeed.
      return { ...base, stages: [], margin: 0, success: true, greatSuccess: false, fumble: false, stopped: false, tier: "on_success" };
    }

    const stages: StageResult[] = [];
    let stopped = false;
    for (const stage of definition.stages) {
      const result = this.runStage(stage, selected, roster);
      stages.push(result);
      if (!result.check.success && stage.on_failure === "stop") {
        stopped = true;
        break;
      }
    }

    const margins = stages.map((s) => s.check.margin);
    const margin = this.rules.aggregate === "min" ? Math.min(...margins) : margins.reduce((a, b) => a + b, 0);
    const fumble = stages.some((s) => s.check.fumble);
    const stunning = stages.some((s) => s.check.stunningSuccess);
    const success = !fumble && !stopped && margin >= this.rules.thresholds.success_margin;
    const greatSuccess = success && (stunning || margin >= this.rules.thresholds.great_success_margin);

    return {
      ...base,
      stages,
      margin,
      success,
      greatSuccess,
      fumble,
      stopped,
      tier: greatSuccess ? "on_great_success" : success ? "on_success" : "on_failure",
    };
  }

  private runStage(stage: ResolutionStage, selected: SelectedInteraction, roster: Roster): StageResult {
    const actor =
      stage.actor === "responder" ? (selected.participants[1] ?? selected.participants[0]) : selected.participants[0];
    const character: Character = roster.get(actor) ?? { id: actor };

    const request: SkillCheckRequest = {
      targetNumber: stage.target ?? this.rules.base_target,
      trained: false,
      skillLevel: 0,
      attribute: 0,
      difficulty: this.difficulty(stage, selected),
    };

    let skill: string | null = null;
    if (stage.attribute !== undefined) {
      request.attribute = character.attributes?.[stage.attribute] ?? 0;
    } else {
      const level = stage.skill === undefined ? 0 : (character.skills?.[stage.skill] ?? 0);
      const linked = stage.fallback_attribute === undefined ? 0 : (character.attributes?.[stage.fallback_attribute] ?? 0);
      if (stage.skill !== undefined && level > 0) {
        skill = stage.skill;
        request.trained = true;
        request.skillLevel = level;
      }
      request.attribute = linked;
    }

    return { stageId: stage.id, actor, skill, check: this.skillCheck.resolve(request) };
  }

  private difficulty(stage: ResolutionStage, selected: SelectedInteraction): number {
    const label = stage.difficulty === undefined ? 0 : (this.rules.difficulty_labels[stage.difficulty] ?? 0);
    switch (stage.difficulty_source) {
      case "none":
        return label;
      case "tone":
        return label + selected.modifiers.tone;
      case "environment":
        return label + selected.modifiers.environment;
      case "tone_and_environment":
        return label + selected.modifiers.tone + selected.modifiers.environment;
    }
  }
}
