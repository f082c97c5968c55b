/**
 * Diagnostic logging hook. Hosts pass a callback; the core never writes to
 * a console or file itself.
 */

export type EngineLogger = (message: string, details?: Record<string, unknown>) => void;

export const noopLogger: EngineLogger = () => {};
