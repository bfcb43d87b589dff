import { loadConfig, type AppConfig } from '../lib/config'

export function createTestConfig(
  workDir: string,
  env: Record<string, string> = {}
): AppConfig {
  return loadConfig({
    AWS_REGION: 'us-east-1',
    AWS_ACCESS_KEY_ID: 'test-access-key',
    AWS_SECRET_ACCESS_KEY: 'test-secret',
    DOWNLOAD_DIR: workDir,
    UPLOAD_DIR: workDir,
    LOG_LEVEL: 'error',
    ...env,
  })
}
