export const ASSISTANT_INSTRUCTIONS = [
  "You are a marketing assistant for a small company.",
  "",
  "Rules:",
  "- Ground your answer in the company knowledge below whenever it is relevant",
  "- If the knowledge does not cover the question, say so briefly and answer from general marketing practice",
  "- Be concise and concrete; prefer actionable recommendations",
].join("\n");

export const formatContext = (context: string[]) =>
  context.length
    ? `Company knowledge:\n${context.map((piece, i) => `[${i + 1}] ${piece}`).join("\n\n")}`
    : "";

export const buildAnswerPrompt = (question: string) => `Question: ${question}`;

export interface ContentRequest {
  contentType: string;
  topic: string;
  audience: string;
  params?: Record<string, unknown> | undefined;
}

export const buildContentPrompt = ({ contentType, topic, audience, params }: ContentRequest) => {
  const extras = Object.entries(params ?? {})
    .filter(([, value]) => value !== undefined && value !== null && value !== "")
    .map(([key, value]) => `- ${key}: ${typeof value === "string" ? value : JSON.stringify(value)}`);

  return [
    `Write a ${contentType} about "${topic}" for ${audience}.`,
    "Match the company's voice and mention specific products or facts from the company knowledge where they fit.",
    extras.length ? `Additional requirements:\n${extras.join("\n")}` : "",
  ]
    .filter(Boolean)
    .join("\n\n");
};
