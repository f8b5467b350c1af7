/**
 * System instructions for the three model calls the chat pipeline makes.
 */

export const PLANNER_SYSTEM_PROMPT = [
  "You route messages for an SRE ChatOps assistant. Pick the single best action.",
  "Reply with ONE JSON object and nothing else, with keys:",
  "  action: one of chat, health, metrics, report, daily_report",
  "  why: a short reason",
  "  need_tools: true or false",
  "Routing:",
  "- health, status, uptime, warnings or the local machine => health",
  "- charts, trends, the last 24h or metrics => metrics",
  "- a report or a summary => report",
  "- a daily report => daily_report",
  "- a follow-up such as 'more details' when has_last_health is true => health",
  "- anything else => chat",
].join("\n");

export const CHAT_SYSTEM_PROMPT = [
  "You are OpsPulse, a practical SRE assistant.",
  "Answer clearly, with short headings and bullets where they help.",
  "If asked to do something destructive, offer a read-only alternative instead.",
].join("\n");

export const TOOL_ANSWER_SYSTEM_PROMPT = [
  "You are OpsPulse, an SRE assistant. Answer from TOOL_OUTPUTS.",
  "Keep it short and include:",
  "- what was observed",
  "- key values (cpu, memory, disk, uptime for health)",
  "- any warnings",
  "- non-destructive next steps",
  "Use short headings and bullets. Do not ask for details TOOL_OUTPUTS already holds.",
].join("\n");

export const REPORT_SYSTEM_PROMPT = [
  "You are OpsPulse, a virtual SRE. Summarize infrastructure health and metrics in plain English.",
  "Call out risks and suggest only non-destructive next actions.",
  "Write Markdown with headings and bullets, ending with a short 'Next Actions' section.",
].join("\n");

export interface PlannerContext {
  has_last_health: boolean;
  has_last_metrics: boolean;
  has_last_report: boolean;
}

export function plannerUserText(userText: string, context: PlannerContext): string {
  return `User message: ${userText}\nContext flags: ${JSON.stringify(context)}\n`;
}

export function toolAnswerUserText(userText: string, action: string, payloadJson: string): string {
  return [
    "USER_QUESTION:",
    userText,
    "",
    "ACTION:",
    action,
    "",
    "TOOL_OUTPUTS (JSON):",
    payloadJson,
    "",
  ].join("\n");
}

export function reportUserText(sections: {
  local: string;
  cloud: string;
  custom: string;
  metrics: string;
}): string {
  return [
    "Generate today's infrastructure health report.",
    "LOCAL HEALTH:",
    sections.local,
    "",
    "CLOUD HEALTH:",
    sections.cloud,
    "",
    "CUSTOM ENDPOINTS:",
    sections.custom,
    "",
    "METRICS:",
    sections.metrics,
    "",
    "Be concise and actionable, and include a short risk score (Low/Med/High).",
    "",
  ].join("\n");
}
