import { createAppLogger } from '../lib/logger'

// Quiet enough that expected warnings do not clutter test output
export const testLogger = createAppLogger('Test', 'error')
