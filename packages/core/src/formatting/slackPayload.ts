import type { AnalysisResult, CallRecord, PostContent } from "../types/calls";

export const TRANSCRIPT_PREVIEW_LENGTH = 200;

type TextObject = { type: "plain_text" | "mrkdwn"; text: string };

export type SlackBlock =
  | { type: "header"; text: TextObject }
  | { type: "section"; text?: TextObject; fields?: TextObject[] }
  | { type: "divider" }
  | { type: "context"; elements: TextObject[] };

export interface SlackMessage {
  text: string;
  blocks: SlackBlock[];
}

function mrkdwn(text: string): TextObject {
  return { type: "mrkdwn", text };
}

function numbered(items: string[]): string {
  return items.map((item, i) => `${i + 1}. ${item}`).join("\n");
}

export function truncatePreview(text: string, max = TRANSCRIPT_PREVIEW_LENGTH): string {
  return text.length > max ? `${text.slice(0, max)}…` : text;
}

export function formatViralPostMessage(
  call: CallRecord,
  analysis: AnalysisResult,
  content: PostContent
): SlackMessage {
  const blocks: SlackBlock[] = [
    { type: "header", text: { type: "plain_text", text: "🚀 Viral Content Generated" } },
    {
      type: "section",
      fields: [
        mrkdwn(`*Pain point:*\n${analysis.painPoint}`),
        mrkdwn(`*Score:*\n${analysis.score}/10`),
        mrkdwn(`*Row:*\n${call.rowIndex}`),
      ],
    },
    { type: "divider" },
    { type: "section", text: mrkdwn(`*Hooks*\n${numbered(content.hooks) || "_(none)_"}`) },
    { type: "divider" },
    { type: "section", text: mrkdwn(`*🇬🇧 English slides*\n${numbered(content.englishSlides) || "_(none)_"}`) },
    { type: "divider" },
    { type: "section", text: mrkdwn(`*🇮🇳 Tamil slides*\n${numbered(content.tamilSlides) || "_(none)_"}`) },
  ];

  if (analysis.transcriptSummary) {
    blocks.push({
      type: "context",
      elements: [mrkdwn(`Transcript: ${truncatePreview(analysis.transcriptSummary)}`)],
    });
  }

  return {
    text: `Viral content generated for row ${call.rowIndex} (score ${analysis.score}/10)`,
    blocks,
  };
}
