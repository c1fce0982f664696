export { GraphStore } from "./graph-store"
export type { StoredVertex, StoredEdge, StoreData, TransactionSnapshot } from "./types"
