import { hasIndicatorCategory } from "./driftClassifier";
import type {
  AssignmentContext,
  AssignmentQuestion,
  DriftAnalysis,
  Recommendation,
  StudentProgressSnapshot
} from "./focusTypes";

interface TemplateInput {
  analysis: Pick<DriftAnalysis, "indicators">;
  question?: AssignmentQuestion;
  evidenceFound: readonly string[];
}

type RedirectTemplate = (input: TemplateInput) => string;

const pick = (value: string | undefined, fallback: string): string => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : fallback;
};

const gentleNudge: RedirectTemplate = ({ question }) => {
  const title = pick(question?.title, "the current question");
  return [
    `Good thought. Let's tie it back to **${title}** so it feeds into your written response.`,
    "",
    "Which passage or data point in the article speaks to this question? Try to point to something concrete you could cite."
  ].join("\n");
};

const standardRedirect: RedirectTemplate = ({ question }) => {
  const id = pick(question?.id, "Q");
  const title = pick(question?.title, "Current Question");
  const evidence = pick(question?.required_evidence, "specific evidence from the article");
  return [
    "That's a reasonable thing to wonder about, but let's spend our time on the assignment itself.",
    "",
    `**Current focus: ${id} - ${title}**`,
    "",
    `This question calls for ${evidence.toLowerCase()}. What in the article addresses it directly? Let's collect that evidence one piece at a time.`
  ].join("\n");
};

const firmLeadIn = (indicators: readonly string[]): string => {
  if (hasIndicatorCategory(indicators, "curiosity_driven")) {
    return "I can tell the wider topic interests you, but ";
  }
  if (hasIndicatorCategory(indicators, "meta_questions")) {
    return "I hear that you're unsure why this matters, but ";
  }
  return "That's an interesting direction, but ";
};

const firmRedirect: RedirectTemplate = ({ analysis, question }) => {
  const id = pick(question?.id, "Q");
  const title = pick(question?.title, "the current question");
  return [
    `${firmLeadIn(analysis.indicators)}the assignment has to come first if you want a strong submission.`,
    "",
    `**Back to ${id}: ${title}**`,
    "",
    "This question is there to build a specific analytical skill. Which evidence from the article will you build your answer on? I'll help you find it and work through what it shows."
  ].join("\n");
};

const strongRedirect: RedirectTemplate = ({ question }) => {
  const id = pick(question?.id, "Q");
  const title = pick(question?.title, "the current question");
  const wordTarget = pick(question?.word_target, "150-200 words");
  return [
    "We've drifted a long way from the assignment. Let's reset.",
    "",
    `**Assignment requirement: ${id} - ${title}**`,
    `**Target length: ${wordTarget}**`,
    "",
    "A good answer responds to this question directly, using evidence from the assigned article. Start with two things:",
    "",
    "1. In your own words, what is the question asking you to do?",
    "2. Which part of the article is most relevant to it?",
    "",
    "We'll build the response from there, step by step."
  ].join("\n");
};

const bridgeRedirect: RedirectTemplate = ({ question }) => {
  const title = pick(question?.title, "the current question");
  return [
    "Curiosity like that is worth keeping. Let's point it at the assignment.",
    "",
    `**${title}** connects to what you're asking about. Once you have solid evidence from the article, we can look at how it fits the bigger picture you're curious about.`,
    "",
    "Which example or result in the article caught your attention? Start there and we'll build the analysis out."
  ].join("\n");
};

const motivationalRedirect: RedirectTemplate = ({ question }) => {
  const title = pick(question?.title, "this question");
  const bloom = pick(question?.bloom_level, "analytical");
  return [
    `Fair question. Here is what working through **${title}** gives you:`,
    "",
    `It exercises your ${bloom} thinking, the same kind of reasoning ecologists use when they weigh field evidence. Working from the article's evidence is how that skill gets built.`,
    "",
    "Those skills carry over to real environmental problems. So, what's the first piece of evidence in the article that bears on this question?"
  ].join("\n");
};

const progressRedirect: RedirectTemplate = ({ question, evidenceFound }) => {
  const id = pick(question?.id, "Q");

  if (evidenceFound.length > 0) {
    const shown = evidenceFound.slice(0, 2).join(", ");
    const more = evidenceFound.length > 2 ? "..." : "";
    return [
      `We keep coming back to the same questions. Let's turn that into progress on **${id}**.`,
      "",
      `You've already found: ${shown}${more}`,
      "",
      "Next step: how does that evidence answer the question? Tell me what you think it means."
    ].join("\n");
  }

  return [
    `Let's step out of this loop and make real progress on **${id}**.`,
    "",
    "Rather than another question, find ONE specific example, quote or data point in the article that relates to this question.",
    "",
    "When you have it, tell me what it says and where it appears in the article."
  ].join("\n");
};

const TEMPLATES: Record<Exclude<Recommendation, "continue">, RedirectTemplate> = {
  gentle_nudge: gentleNudge,
  redirect: standardRedirect,
  firm_redirect: firmRedirect,
  strong_redirect: strongRedirect,
  bridge_redirect: bridgeRedirect,
  motivational_redirect: motivationalRedirect,
  progress_redirect: progressRedirect
};

export const generateRedirectionResponse = (
  analysis: Pick<DriftAnalysis, "recommendation" | "indicators">,
  currentQuestion?: AssignmentQuestion,
  assignmentContext?: AssignmentContext,
  studentProgress?: StudentProgressSnapshot
): string => {
  if (analysis.recommendation === "continue") return "";

  const template = TEMPLATES[analysis.recommendation];
  return template({
    analysis,
    question: currentQuestion,
    evidenceFound: studentProgress?.evidence_found ?? assignmentContext?.evidence_found ?? []
  });
};
