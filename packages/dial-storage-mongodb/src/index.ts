import { storageDrivers } from "@dialkit/dial-storage";
import { mongoDriver } from "./mongo-repository.js";

// Importing this package makes mongodb:// and mongodb+srv:// descriptors work
storageDrivers.register("mongodb", mongoDriver);
storageDrivers.register("mongodb+srv", mongoDriver);

export {
  MongoRepository,
  mongoDriver,
  mongoTarget,
  DEFAULT_COLLECTION,
  DEFAULT_DATABASE,
} from "./mongo-repository.js";
export type { MongoTarget } from "./mongo-repository.js";
export { wrapCollection, isRecordCollection } from "./mongo-collection.js";
export type { RecordCollection, RecordDocument } from "./mongo-collection.js";
