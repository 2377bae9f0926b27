export { readInputLines } from "./read-lines.js";
