import { RuntimeContext } from '@mastra/core/runtime-context'
import { StorageOperations } from '../storage/storage-operations'

const OPERATIONS_KEY = 'storageOperations'
const DOWNLOAD_DIR_KEY = 'downloadDir'

/**
 * Runtime context handed to every storage tool: the session's storage
 * operations and the directory download_file writes to by default.
 */
export function createStorageRuntimeContext(
  operations: StorageOperations,
  downloadDir: string
): RuntimeContext {
  const runtimeContext = new RuntimeContext()
  runtimeContext.set(OPERATIONS_KEY, operations)
  runtimeContext.set(DOWNLOAD_DIR_KEY, downloadDir)
  return runtimeContext
}

export function getStorageOperations(
  runtimeContext: RuntimeContext
): StorageOperations {
  const operations = runtimeContext.get(OPERATIONS_KEY)
  if (!(operations instanceof StorageOperations)) {
    throw new Error('Storage tools need StorageOperations in the runtime context')
  }
  return operations
}

export function getDownloadDir(runtimeContext: RuntimeContext): string {
  const downloadDir = runtimeContext.get(DOWNLOAD_DIR_KEY)
  if (typeof downloadDir !== 'string') {
    throw new Error('Storage tools need a download directory in the runtime context')
  }
  return downloadDir
}

export function toIsoString(date: Date | undefined): string | undefined {
  return date?.toISOString()
}
