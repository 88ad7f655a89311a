export interface CommandResult {
  command: string;
  name: string;
  payload: unknown;
}

/** A parsed API call, whether it came in over HTTP or the websocket. */
export interface CommandRequest {
  command: string;
  params: URLSearchParams;
  body?: unknown;
}

/** Request-level failure (bad or missing arguments, unknown command) with its HTTP status. */
export class CommandError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = 'CommandError';
  }
}

export function response(command: string, name: string, result: unknown): CommandResult {
  return {
    command: command.trim(),
    name: name.trim(),
    payload: result,
  };
}

/** Names a result after the last word of the command (`music/artist/get` -> `get`). */
export function commandResponse(command: string, result: unknown): CommandResult {
  const parts = command.split('/');
  for (let i = parts.length; i--; ) {
    if (/^[a-z]/.test(parts[i])) {
      return response(command, parts[i], result);
    }
  }
  return response(command, 'response', result);
}
