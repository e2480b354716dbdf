export {
  parseDeclaration,
  parseDeclarations,
  renderDeclaration,
  mapTypeName,
  type DeclarationBlock,
  type MappedType,
} from './parser.js';
