import { CollaboratorError } from '../core/errors.js';
import { errorMessage } from '../core/utils.js';
import { ResultSink, SinkPayload, SinkReceipt } from './types.js';

export { ARTIFACTS, FileSink } from './file.js';
export { GitHubCommentSink } from './github-comment.js';
export type { GitHubCommentSinkOptions } from './github-comment.js';
export type { ResultSink, SinkPayload, SinkReceipt } from './types.js';

/**
 * Deliver to one sink; a failure becomes a SinkError record
 */
export async function deliverSafely(
  sink: ResultSink,
  payload: SinkPayload
): Promise<{ receipt?: SinkReceipt; error?: CollaboratorError }> {
  try {
    return { receipt: await sink.deliver(payload) };
  } catch (error) {
    return { error: { kind: 'SinkError', collaborator: sink.name, message: errorMessage(error) } };
  }
}
