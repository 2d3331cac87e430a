/**
 * Room title/topic summarization prompts.
 */

export const TITLE_PROMPT = [
  "Summarize this conversation in less than 20 characters to use as the title of this conversation.",
  "The output should be a single line of text describing the conversation.",
  "Do not output anything except for the summary text.",
  "Only the first 20 characters will be used.",
].join(" ");

export const TOPIC_PROMPT = [
  "Summarize this conversation in less than 50 characters.",
  "Do not output anything except for the summary text.",
  "Do not include any commentary or context, only the summary.",
].join(" ");

/**
 * Models tend to wrap the summary in commentary; when the reply contains
 * a double-quoted string, only its content is kept.
 */
export function cleanSummary(response: string): string {
  const quoted = /"([^"]*)"/.exec(response);
  return (quoted?.[1] ?? response).trim();
}
