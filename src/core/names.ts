const PATH_COMPONENT = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;
const MAX_LENGTH = 64;

/**
 * Why `value` cannot be used inside an artifact file name, or null when it
 * can.
 */
export function pathComponentProblem(value: string): string | null {
  if (value.length === 0) return "must not be empty";
  if (value.length > MAX_LENGTH) return `must be at most ${MAX_LENGTH} characters`;
  if (!PATH_COMPONENT.test(value)) {
    return "may only contain letters, digits, '_', '.' and '-' and must start with a letter or digit";
  }
  return null;
}
