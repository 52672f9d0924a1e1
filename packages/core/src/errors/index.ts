export {
  DatastoreError,
  NotFoundError,
  UnsupportedError,
  isNotFoundError,
  type DatastoreErrorOptions,
} from './catalog.js'
