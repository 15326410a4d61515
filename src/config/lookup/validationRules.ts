export const LOOKUP_RULES = {
  titleMinLength: 5,
  titleMaxLength: 500,
  authorMinLength: 2,
  authorMaxLength: 100
} as const;
