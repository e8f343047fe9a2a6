export {
  knownObjectSizeSchema,
  objectSizeCatalogSchema,
  OBJECT_CATEGORIES,
  MEASUREMENT_AXES,
  type KnownObjectSize,
  type ObjectSizeCatalog,
  type ObjectCategory,
  type MeasurementAxis,
} from './schema.js'

export {
  parseCatalog,
  loadCatalog,
  loadDefaultCatalog,
  CatalogError,
  DEFAULT_CATALOG_URL,
} from './catalog.js'

export {
  CatalogLookup,
  lookupFrom,
  type ObjectSizeLookup,
} from './lookup.js'
