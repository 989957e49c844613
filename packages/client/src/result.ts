/**
 * Outcome of a single remote call.
 *
 * - success: the server ran the call and returned a value
 * - clientError: the call failed on this side (credentials, transport, decoding)
 * - serverError: the server ran the call and reported a failure
 */

export type Result<T> =
  | { type: "success"; value: T }
  | { type: "clientError"; message: string }
  | { type: "serverError"; message: string };

export const success = <T>(value: T): Result<T> => ({ type: "success", value });

export const clientError = <T = never>(message: string): Result<T> => ({
  type: "clientError",
  message,
});

export const serverError = <T = never>(message: string): Result<T> => ({
  type: "serverError",
  message,
});

export const isSuccess = <T>(result: Result<T>): result is { type: "success"; value: T } =>
  result.type === "success";

export const DEFAULT_SERVER_NAME = "NStack server";

/**
 * Render a result for the terminal. `formatter` only ever sees success values.
 */
export const formatResult = <T>(
  result: Result<T>,
  formatter: (value: T) => string,
  serverName: string = DEFAULT_SERVER_NAME
): string => {
  switch (result.type) {
    case "success":
      return formatter(result.value);
    case "clientError":
      return `There was an error communicating with the ${serverName}:\n\n    Error: ${result.message}`;
    case "serverError":
      return `An error was returned from the ${serverName}:\n\n    Error: ${result.message}`;
  }
};
