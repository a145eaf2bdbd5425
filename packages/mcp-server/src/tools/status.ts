import type { StageName, StageRecord } from "@reelclean/core";
import { getCompletedStages, getPipelineStatus, nextStage } from "@reelclean/orchestrator";
import type { ServerState } from "../data/loader";

export interface PipelineStatusOutput {
  stages: StageRecord[];
  nextStage: StageName | null;
  reportable: boolean;
}

export function pipelineStatus(state: ServerState): PipelineStatusOutput {
  const completed = getCompletedStages(state.db);
  const next = nextStage(completed);

  return {
    stages: getPipelineStatus(state.db),
    nextStage: next,
    reportable: next === null,
  };
}
