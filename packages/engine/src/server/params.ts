import { z } from "zod";

/** "true"/"false" query flag with a default when absent. */
function flag(defaultValue: boolean) {
  return z
    .enum(["true", "false"])
    .optional()
    .transform((value) => (value === undefined ? defaultValue : value === "true"));
}

function bounded(min: number, max: number, defaultValue: number) {
  return z.coerce.number().int().min(min).max(max).default(defaultValue);
}

export function eventListParams(defaultMaxArticles: number) {
  return z.object({
    limit: bounded(1, 50, 10),
    page: z.coerce.number().int().min(1).default(1),
    active: flag(true),
    closed: flag(false),
    include_news: flag(true),
    include_summary: flag(true),
    max_articles: bounded(1, 10, defaultMaxArticles),
  });
}

export function eventDetailParams(defaultMaxArticles: number) {
  return z.object({
    max_articles: bounded(1, 10, defaultMaxArticles),
    include_summary: flag(true),
  });
}

export const EventNewsParams = z.object({
  max_articles: bounded(1, 20, 10),
});

export const SearchParams = z.object({
  q: z.string().min(2),
  limit: bounded(1, 20, 10),
  include_news: flag(false),
});

/** Formats the first validation issue as "field: message". */
export function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  return issue.path.length > 0
    ? `${issue.path.join(".")}: ${issue.message}`
    : issue.message;
}
