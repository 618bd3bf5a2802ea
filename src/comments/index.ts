/**
 * Comment Synthesizers
 *
 * @since 2026-10-19
 */

export { synthesizeComment, functionBrief, DEFAULT_BASE_EXCEPTION } from './CommentSynthesizer.js';
export type { SynthesisOptions } from './CommentSynthesizer.js';
export { humanizeName, splitIdentifier } from './NameHumanizer.js';
