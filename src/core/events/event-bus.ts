/**
 * EventBus - publish/subscribe for pipeline progress events.
 *
 * Handlers run synchronously in subscription order. A throwing or rejecting
 * handler is logged and never affects the run or other handlers.
 */

import { StageFailureKind } from "../errors/pipeline-errors";
import { AppliedFallback, StageState } from "../pipeline/stage-result";

export enum PipelineEventType {
  RUN_STARTED = "run_started",
  STAGE_TRANSITION = "stage_transition",
  RUN_COMPLETED = "run_completed",
  RUN_HALTED = "run_halted",
  RUN_CANCELLED = "run_cancelled",
}

export interface StageTransitionEvent {
  type: PipelineEventType.STAGE_TRANSITION;
  runId: string;
  stageName: string;
  state: StageState;
  elapsedMs: number;
  cacheKey?: string;
  attempts?: number;
  failureKind?: StageFailureKind;
  reason?: string;
  appliedFallback?: AppliedFallback;
  timestamp: Date;
}

export interface RunEvent {
  type:
    | PipelineEventType.RUN_STARTED
    | PipelineEventType.RUN_COMPLETED
    | PipelineEventType.RUN_HALTED
    | PipelineEventType.RUN_CANCELLED;
  runId: string;
  stageOrder: string[];
  stageName?: string;
  reason?: string;
  timestamp: Date;
}

export type PipelineEvent = StageTransitionEvent | RunEvent;

export type PipelineEventHandler = (event: PipelineEvent) => void | Promise<void>;

export class EventBus {
  private handlers = new Map<number, PipelineEventHandler>();
  private nextId = 0;

  /**
   * Subscribe to all events
   * @returns Unsubscribe function
   */
  subscribe(handler: PipelineEventHandler): () => void {
    const key = this.nextId++;
    this.handlers.set(key, handler);
    return () => {
      this.handlers.delete(key);
    };
  }

  get handlerCount(): number {
    return this.handlers.size;
  }

  emit(event: PipelineEvent): void {
    for (const handler of Array.from(this.handlers.values())) {
      try {
        const result = handler(event);
        if (result instanceof Promise) {
          result.catch((err) => {
            console.error("[EventBus] Async handler error:", err);
          });
        }
      } catch (err) {
        console.error("[EventBus] Handler error:", err);
      }
    }
  }
}
