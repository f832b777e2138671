/**
 * Text value of a form field; '' when absent or a file
 */
export function formString(formData: FormData, key: string): string {
  const value = formData.get(key);
  return typeof value === 'string' ? value : '';
}

/**
 * Text value, or undefined when the field is blank
 */
export function optionalFormString(
  formData: FormData,
  key: string,
): string | undefined {
  const value = formString(formData, key);
  return value.trim() === '' ? undefined : value;
}

/**
 * Number typed into a form field. Blank and non-numeric input gives NaN so
 * validation reports it.
 */
export function formNumber(formData: FormData, key: string): number {
  const value = formString(formData, key).trim();
  return value === '' ? Number.NaN : Number(value);
}

/**
 * Same-origin path to continue to after sign-in; anything else falls back
 */
export function safeRedirectPath(
  value: string | undefined,
  fallback: string,
): string {
  if (!value || !value.startsWith('/') || value.startsWith('//')) {
    return fallback;
  }
  return value;
}
