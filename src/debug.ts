export type DebugSink = (message: string) => void;

let debugEnabled = false;
let debugSink: DebugSink = (message) => console.debug(message);

export const isDebugEnabled = (): boolean => debugEnabled;

export const setDebugEnabled = (enabled: boolean): void => {
  debugEnabled = enabled;
};

export const setDebugSink = (sink: DebugSink): void => {
  debugSink = sink;
};

export const debugLog = (scope: string, ...args: unknown[]): void => {
  if (!isDebugEnabled()) return;
  const timestamp = new Date().toISOString();
  const text = args
    .map((a) => (typeof a === "object" ? JSON.stringify(a) : String(a)))
    .join(" ");
  debugSink(`[${timestamp}] [${scope}] ${text}`);
};
