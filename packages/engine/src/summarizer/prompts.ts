import type { ScoredArticle } from "../types.js";

export const MAX_PROMPT_ARTICLES = 5;
const DESCRIPTION_LIMIT = 300;
const ARTICLE_DESCRIPTION_LIMIT = 200;

/**
 * System prompt for the news summarizer. The model is told to stay
 * descriptive: sentiment reports what the coverage implies for the
 * event, it is not a forecast.
 */
export function buildSummarySystemPrompt(): string {
  return `You are a financial analyst assistant that summarizes news for prediction market events.

YOUR TASK:
1. Analyze the provided news articles related to a prediction market event
2. Generate a concise, objective summary
3. Extract key points that might influence the market
4. Assess the overall sentiment (bullish = event likely to happen, bearish = unlikely, neutral = unclear)
5. Rate your confidence based on news quality and relevance

IMPORTANT:
- Be objective, don't predict outcomes
- Focus on facts from the news
- Note any conflicting information
- Keep summary under 150 words
- Return JSON format only`;
}

export interface SummaryPromptInput {
  title: string;
  description: string;
  articles: ScoredArticle[];
  marketPrice?: number;
}

/** "72% Yes" for a 0-1 price; "N/A" when there is none. */
export function formatMarketPrice(marketPrice?: number): string {
  return marketPrice ? `${(marketPrice * 100).toFixed(0)}% Yes` : "N/A";
}

/**
 * User prompt: the event, its current price and up to five ranked
 * articles, followed by the JSON shape to answer in.
 */
export function buildSummaryUserPrompt(input: SummaryPromptInput): string {
  let articlesText = "";
  input.articles.slice(0, MAX_PROMPT_ARTICLES).forEach(({ article }, index) => {
    articlesText += `\n${index + 1}. [${article.sourceName}] ${article.title}\n`;
    if (article.description) {
      articlesText += `   ${article.description.slice(0, ARTICLE_DESCRIPTION_LIMIT)}...\n`;
    }
  });

  const description = input.description
    ? input.description.slice(0, DESCRIPTION_LIMIT)
    : "N/A";

  return `Prediction Market Event:
Title: ${input.title}
Description: ${description}
Current Market Price: ${formatMarketPrice(input.marketPrice)}

Related News Articles:
${articlesText}

Generate a summary in this JSON format:
{
    "summary": "Brief 2-3 sentence overview of the situation",
    "key_points": ["Point 1", "Point 2", "Point 3"],
    "sentiment": "bullish|bearish|neutral",
    "confidence": "high|medium|low"
}`;
}
