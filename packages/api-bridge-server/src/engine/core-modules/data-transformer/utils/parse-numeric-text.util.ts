// Number() accepts '' and whitespace as 0, which must not count as numeric.
export const parseNumericText = (text: string): number | null => {
  const trimmed = text.trim();

  if (trimmed === '') {
    return null;
  }

  const parsed = Number(trimmed);

  return Number.isFinite(parsed) ? parsed : null;
};
