export { Attribute, AttributeScope } from './attribute'
export {
  AttributeCatalog,
  AttributeKeys,
  Attributes,
  BLOCK_TYPE_GROUP,
  defaultCatalog
} from './catalog'
export type { AttributeDefinition, Alignment, ListType } from './catalog'
