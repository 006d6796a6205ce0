export { subjectRegexRule, bodyRegexRule } from './regex.js';
export {
  subjectMaxLengthRule,
  subjectMinLengthRule,
  bodyMaxLengthRule,
  bodyMinLengthRule,
} from './length.js';
