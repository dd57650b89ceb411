export type { IPaperRetriever } from "./paper-retriever.interface.js";
export { SemanticScholarRetriever } from "./semantic-scholar.js";
export type { SemanticScholarConfig } from "./semantic-scholar.js";
