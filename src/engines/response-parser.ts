/**
 * Manager reply protocol
 *
 * A reply is an instruction for the Worker unless it starts with one of the
 * markers below.
 */

import type { BackendResponse } from '../types/manager-backend';

export const NEED_INPUT_MARKER = 'NEED_USER_INPUT:';
export const TASK_COMPLETE_MARKER = 'TASK_COMPLETE';
export const SYSTEM_ERROR_MARKER = 'SYSTEM_ERROR:';

export function parseManagerReply(raw: string): BackendResponse {
  const reply = raw.trim();

  if (reply === '') {
    return { status: 'ERROR', content: 'Manager returned an empty reply' };
  }
  if (reply.startsWith(NEED_INPUT_MARKER)) {
    const question = reply.slice(NEED_INPUT_MARKER.length).trim();
    return { status: 'NEED_INPUT', content: question || 'The Manager needs more information to continue.' };
  }
  if (reply.startsWith(TASK_COMPLETE_MARKER)) {
    return { status: 'COMPLETE', content: reply.slice(TASK_COMPLETE_MARKER.length).trim() };
  }
  if (reply.startsWith(SYSTEM_ERROR_MARKER)) {
    const detail = reply.slice(SYSTEM_ERROR_MARKER.length).trim();
    return { status: 'ERROR', content: detail || 'unspecified error' };
  }
  return { status: 'INSTRUCTION', content: reply };
}
