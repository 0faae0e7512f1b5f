// Example prompts offered to users on the home screen
export const PROMPT_SUGGESTIONS = [
  "Job interview today",
  "Casual coffee date",
  "Gym workout session",
  "Dinner party tonight",
  "Rainy day walk",
  "Beach day with friends",
  "Working from home",
  "Wedding guest outfit",
  "Winter shopping trip",
  "Summer festival",
] as const;

export const MAX_PROMPT_LENGTH = 500;
