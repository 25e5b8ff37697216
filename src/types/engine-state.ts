/**
 * Engine states, in the order they are usually visited
 */
export const ENGINE_STATES = [
  'IDLE',
  'LOADING_PROJECT',
  'PROJECT_SELECTED',
  'RUNNING_WAITING_INITIAL_BACKEND',
  'RUNNING_WAITING_RESULT',
  'RUNNING_PROCESSING_RESULT',
  'RUNNING_CALLING_BACKEND',
  'PAUSED_WAITING_USER_INPUT',
  'TASK_COMPLETE',
  'ERROR',
] as const;

export type EngineState = (typeof ENGINE_STATES)[number];
