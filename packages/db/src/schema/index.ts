export { interactions } from "./interactions.js";
export type { InteractionRow, NewInteractionRow } from "./interactions.js";
