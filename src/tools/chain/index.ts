// Chain tool barrel export
export { chainLatestBlock } from "./latest-block.js";
export { chainTransaction } from "./transaction.js";
