/**
 * Server defaults shared by every client.
 */

export const DEFAULT_SERVER_HOST = "localhost";

/** HTTPS API port of the NStack server */
export const DEFAULT_API_PORT = 8443;
