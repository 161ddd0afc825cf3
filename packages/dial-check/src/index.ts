export { runStorageContractTests } from "./storage-contract.js";
export type { RecordLike, RepositoryFactory, RepositoryLike } from "./storage-contract.js";
