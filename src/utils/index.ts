export {
  isFact,
  isPlainObject,
  valuesEqual,
  hashValue,
  displayValue,
  factEquals,
  factHashCode,
  factToString,
  factToRecord,
} from './value-semantics.js';
export { getAccessorTable, getterName, booleanGetterName, setterName, ACCESSOR_NAME_RE } from './accessors.js';
