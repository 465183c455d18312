/**
 * Workflow controller
 *
 * A small finite-state router. Steps are an explicit enum, transitions come
 * from the pure `nextStep` function and each step's work lives in a handler
 * table, so the routing can be tested without running any pipeline.
 *
 *   route ─┬─ upload ── extract ──┐
 *          ├─ query ──────────────┤
 *          ├─ visualize ──────────┼── end
 *          └─ error ──────────────┘
 *
 * Any step that records an error, or throws, is routed to `error`, which
 * marks the run failed. Every run starts from the state it is given and
 * shares nothing with other runs.
 */

import type { ProcessingResult, QueryResult, GraphData } from '../core/types.js';
import type { GraphStore } from '../storage/types.js';
import type { TextExtractionService } from '../services/text-extraction.js';
import { IngestionPipeline } from '../extraction/ingestion-pipeline.js';
import { QueryPipeline } from '../retrieval/query-pipeline.js';
import { ErrorHandler, ErrorCategory, ErrorSeverity, TextExtractionError, toError } from '../utils/error-handler.js';

export enum WorkflowStep {
  ROUTE = 'route',
  UPLOAD = 'upload',
  EXTRACT = 'extract',
  QUERY = 'query',
  VISUALIZE = 'visualize',
  ERROR = 'error',
  END = 'end'
}

export type WorkflowAction = 'upload' | 'query' | 'visualize';

export interface WorkflowState {
  action?: string;
  userId: string;
  fileData?: Uint8Array;
  filename?: string;
  extractedText?: string;
  fileType?: string;
  processingResult?: ProcessingResult;
  question?: string;
  queryResult?: QueryResult;
  graphData?: GraphData;
  error?: string;
  success: boolean;
}

export type StepHandler = (state: WorkflowState, signal?: AbortSignal) => Promise<WorkflowState>;

export type HandlerTable = Record<Exclude<WorkflowStep, WorkflowStep.END>, StepHandler>;

const ACTION_STEPS: Record<WorkflowAction, WorkflowStep> = {
  upload: WorkflowStep.UPLOAD,
  query: WorkflowStep.QUERY,
  visualize: WorkflowStep.VISUALIZE
};

function isWorkflowAction(action: string): action is WorkflowAction {
  return Object.prototype.hasOwnProperty.call(ACTION_STEPS, action);
}

/**
 * Transition function: the step that follows `step` given the state it produced
 */
export function nextStep(step: WorkflowStep, state: WorkflowState): WorkflowStep {
  if (step === WorkflowStep.END || step === WorkflowStep.ERROR) {
    return WorkflowStep.END;
  }
  if (state.error) {
    return WorkflowStep.ERROR;
  }

  switch (step) {
    case WorkflowStep.ROUTE:
      return state.action && isWorkflowAction(state.action) ? ACTION_STEPS[state.action] : WorkflowStep.ERROR;
    case WorkflowStep.UPLOAD:
      return WorkflowStep.EXTRACT;
    case WorkflowStep.EXTRACT:
    case WorkflowStep.QUERY:
    case WorkflowStep.VISUALIZE:
      return WorkflowStep.END;
  }
}

export interface WorkflowDeps {
  store: GraphStore;
  textExtraction: TextExtractionService;
  ingestion: IngestionPipeline;
  queryPipeline: QueryPipeline;
}

/**
 * Handler table for the production pipelines
 */
export function createHandlers(deps: WorkflowDeps): HandlerTable {
  return {
    [WorkflowStep.ROUTE]: async state => {
      if (state.action && isWorkflowAction(state.action)) {
        return state;
      }
      return { ...state, error: state.action ? `Unknown action '${state.action}'` : 'Action is required' };
    },

    [WorkflowStep.UPLOAD]: async (state, signal) => {
      if (!state.fileData || !state.filename) {
        return { ...state, error: 'File data and filename are required' };
      }

      let text = '';
      let fileType = '';
      try {
        const extracted = await deps.textExtraction.extract(state.fileData, state.filename);
        text = extracted.text;
        fileType = extracted.detectedType;
      } catch (error) {
        signal?.throwIfAborted();
        ErrorHandler.handle(
          ErrorCategory.EXTRACTION,
          ErrorSeverity.MEDIUM,
          `Text extraction threw for ${state.filename}`,
          toError(error),
          { userId: state.userId }
        );
      }

      if (!text.trim()) {
        return { ...state, fileType, error: new TextExtractionError().message };
      }

      return { ...state, extractedText: text, fileType };
    },

    [WorkflowStep.EXTRACT]: async (state, signal) => {
      const processingResult = await deps.ingestion.ingestText(state.extractedText ?? '', state.userId, signal);
      return { ...state, processingResult, success: true };
    },

    [WorkflowStep.QUERY]: async (state, signal) => {
      const question = state.question?.trim();
      if (!question) {
        return { ...state, error: 'Question is required' };
      }

      const queryResult = await deps.queryPipeline.answer(question, state.userId, signal);
      return { ...state, queryResult, success: true };
    },

    [WorkflowStep.VISUALIZE]: async state => {
      const graphData = await deps.store.exportGraph(state.userId);
      return { ...state, graphData, success: true };
    },

    [WorkflowStep.ERROR]: async state => ({ ...state, success: false })
  };
}

export class WorkflowController {
  private handlers: HandlerTable;

  constructor(handlers: HandlerTable) {
    this.handlers = handlers;
  }

  /**
   * Drive one run from `route` to `end`. Never throws: failures end in the
   * `error` step with `success: false` and the message on `state.error`.
   */
  async run(initial: WorkflowState, signal?: AbortSignal): Promise<WorkflowState> {
    let state: WorkflowState = { ...initial, success: false };
    let step = WorkflowStep.ROUTE;

    while (step !== WorkflowStep.END) {
      const handler = this.handlers[step];

      try {
        state = await handler(state, signal);
        step = nextStep(step, state);
      } catch (error) {
        const failure = toError(error);
        ErrorHandler.handle(
          ErrorCategory.PROCESSING,
          ErrorSeverity.HIGH,
          `Workflow step '${step}' failed`,
          failure,
          { userId: state.userId, action: state.action }
        );
        state = { ...state, error: failure.message || `Step '${step}' failed` };
        step = step === WorkflowStep.ERROR ? WorkflowStep.END : WorkflowStep.ERROR;
      }
    }

    if (state.error) {
      state = { ...state, success: false };
    }

    return state;
  }
}
