/**
 * A news article as collected from search. `score` and `reason` are filled
 * in by the scoring stage; an unscored article ranks as 0.
 */
export type Article = {
  readonly url: string;
  readonly title: string;
  readonly rawContent: string;
  score?: number;
  reason?: string;
};

export type TopStory = {
  readonly headline: string;
  readonly summary: string;
  readonly link: string;
};

export type NewsletterContent = {
  readonly opening_hook: string;
  readonly top_stories: ReadonlyArray<TopStory>;
  readonly tool_of_the_day: string;
  readonly closing_thought: string;
  readonly original_articles: ReadonlyArray<Article>;
};

export type SearchResult =
  | { readonly success: true; readonly query: string; readonly articles: ReadonlyArray<Article> }
  | { readonly success: false; readonly query: string; readonly error: string };
