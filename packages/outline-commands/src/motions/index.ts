export {
  findLeftText,
  moveHorizontal,
  moveVertical,
  notBrowsable,
  type VerticalDirection
} from "./gridMotions";
export { WORD_SEPARATORS, findSeparator, moveByWord, type WordMotion } from "./wordMotions";
