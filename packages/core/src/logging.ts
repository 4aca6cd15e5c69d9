export type LogStream = "stdout" | "stderr";

/**
 * Receives progress lines from long-running operations. The CLI decides how
 * (and whether) to render them.
 */
export type LogCallback = (line: string, stream: LogStream) => void;

export const silentLog: LogCallback = () => undefined;
