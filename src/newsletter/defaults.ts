/** Copy used in place of blank newsletter fields. */
export const FALLBACK_COPY = {
  openingHook: "Here is your daily AI briefing.",
  toolOfTheDay: "Explore new AI tools to boost your productivity.",
  closingThought:
    "The field of AI continues to evolve at a breathtaking pace. Stay curious!",
  headline: "Untitled",
  summary: "No summary available.",
  link: "#",
  missing: "N/A",
} as const;

export function orFallback(value: string | undefined, fallback: string): string {
  return value !== undefined && value.trim().length > 0 ? value : fallback;
}
