// SQL tool barrel export
export { sqlQuery } from "./query.js";
export { sqlTables } from "./tables.js";
export { sqlSchema } from "./schema.js";
export { sqlExamples } from "./examples.js";
export { sqlBlockchainQuery } from "./blockchain-query.js";
