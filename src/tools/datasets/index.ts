// Dataset tool barrel export
export { datasetsList } from "./list.js";
export { datasetsQuery } from "./query.js";
export { datasetsDescribe } from "./describe.js";
export { datasetsLookup } from "./lookup.js";
