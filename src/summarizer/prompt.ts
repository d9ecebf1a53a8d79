export const SYSTEM_PROMPT =
  "You are an expert at summarizing YouTube video transcripts. Provide a concise, easy-to-read summary that captures the key points. Crucially, the entire response must be in plain text, with no Markdown formatting (no headers, bold text, or lists).";

export function buildUserPrompt(transcript: string): string {
  return `Please summarize the following transcript:\n\n${transcript}`;
}
