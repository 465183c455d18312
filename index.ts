/**
 * coursegraph: study-material knowledge graphs with hybrid retrieval
 *
 * Upload study documents, extract a typed knowledge graph per user, and ask
 * questions answered from graph neighborhoods plus vector-similar excerpts.
 */

export * from "./src/index.js";
