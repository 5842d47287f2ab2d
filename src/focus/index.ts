export { analyzeConversationDrift } from "./driftAnalyzer";
export { classifyDrift, estimateConfidence, getInterventionUrgency, shouldIntervene } from "./driftClassifier";
export { generateRedirectionResponse } from "./redirectionTemplates";
export * from "./focusTypes";
