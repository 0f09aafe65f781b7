const ratio = 2;

/**
 * Delay before retry number `attempt + 1` (attempt is zero-based):
 * base, base*2, base*4 ... capped at `maximum`.
 */
export const calculateBackoff = (attempt: number, base: number, maximum = 30_000): number => {
  const timeout = base * ratio ** attempt;

  return timeout > maximum
    ? maximum
    : timeout;
};
