const LANDSCAPE_TERMS = [
  "habitat",
  "fragmentation",
  "connectivity",
  "patch",
  "corridor",
  "edge",
  "scale",
  "heterogeneity",
  "disturbance",
  "metapopulation",
  "spatial",
  "pattern",
  "process",
  "landscape",
  "ecology"
];

const RESEARCH_TERMS = [
  "method",
  "data",
  "result",
  "finding",
  "hypothesis",
  "conclusion",
  "analysis",
  "study",
  "research",
  "experiment",
  "observation"
];

const firstTerm = (text: string, terms: readonly string[]): string =>
  terms.find((term) => text.includes(term)) ?? "this concept";

/**
 * Rule-based Socratic reply used when no model is configured or the model call fails.
 * `studentTurns` counts the student's messages including `userMessage`.
 */
export const localSocraticReply = (userMessage: string, studentTurns: number): string => {
  const text = userMessage.toLowerCase().trim();
  if (!text) return "What aspects of this article would you like to explore?";

  const landscape = LANDSCAPE_TERMS.some((term) => text.includes(term));
  const research = RESEARCH_TERMS.some((term) => text.includes(term));

  if (studentTurns <= 2) {
    if (landscape || research) {
      const term = firstTerm(text, [...LANDSCAPE_TERMS, ...RESEARCH_TERMS]);
      return `I see you're thinking about ${term}. What specific details from the article support your understanding of this concept?`;
    }
    return "What was the main question the researchers were trying to answer in this study?";
  }

  if (studentTurns <= 6) {
    if (landscape) {
      return `That's good insight about ${firstTerm(text, LANDSCAPE_TERMS)}. Why do you think the researchers focused on this particular aspect? What patterns do you notice?`;
    }
    if (research) {
      return "You're analyzing the methodology well. What do you think influenced the researchers' choice of approach? How might this affect their results?";
    }
    return "What relationships do you see between the variables they studied? What patterns emerge from their data?";
  }

  if (studentTurns <= 10) {
    return "How does this finding connect to the broader principles of landscape ecology we've discussed? Can you think of similar patterns in other systems?";
  }

  return "What assumptions might the researchers be making that aren't explicitly stated? How could this study be improved or extended?";
};
