/**
 * Shared moderation types
 */

/** Outcome of an interactive operation; `error` is safe to show the invoker */
export type ServiceResult<T extends object = object> = ({ success: true } & T) | { success: false; error: string };

/** Clock injected into services so tests can move time */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();
