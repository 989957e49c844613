/**
 * Error description helpers.
 */

const MAX_CAUSE_DEPTH = 5;

/**
 * Describe a thrown value, following its `cause` chain. Node network errors
 * carry their system code (ECONNREFUSED, CERT_HAS_EXPIRED, ...), which is
 * appended when the message does not already mention it.
 */
export const describeError = (err: unknown): string => {
  const parts: string[] = [];
  let current: unknown = err;

  while (current !== undefined && current !== null && parts.length < MAX_CAUSE_DEPTH) {
    if (!(current instanceof Error)) {
      parts.push(String(current));
      break;
    }
    const code = "code" in current && typeof current.code === "string" ? current.code : undefined;
    parts.push(
      code && !current.message.includes(code) ? `${current.message} [${code}]` : current.message
    );
    current = current.cause;
  }

  return parts.join(": ");
};
