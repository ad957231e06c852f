export { evaluate, type EvaluateOptions, type EvaluationResult } from './evaluate.js';
export {
  HOOK_EVENTS,
  StopPayload,
  SubagentStopPayload,
  formatBlockMessage,
  formatPassContext,
  isHookEvent,
  runHook,
  type HookEvent,
  type HookOptions,
  type HookResult,
} from './hook.js';
