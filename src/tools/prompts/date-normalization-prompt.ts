export const getDateNormalizationPrompt = (today: string): string => {
  return `You are a date normalization assistant.
You must resolve the user-provided date expression into an absolute calendar date in ISO 8601 format (YYYY-MM-DD).
Today's reference date is: ${today}.
If the input cannot be understood, respond with the single token: ERROR.`;
};
