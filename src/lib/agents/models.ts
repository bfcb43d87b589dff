import { createAmazonBedrock } from '@ai-sdk/amazon-bedrock'
import { createGoogleGenerativeAI } from '@ai-sdk/google'
import { fromNodeProviderChain } from '@aws-sdk/credential-providers'
import type { LanguageModel } from 'ai'
import type { AwsConfig, LlmConfig } from '../config'
import { ConfigurationError } from '../errors'

/**
 * Builds the language model for one session. Bedrock signs with the session's
 * AWS credentials; Gemini needs its own API key.
 */
export function createLanguageModel(
  llm: LlmConfig,
  aws: AwsConfig
): LanguageModel {
  switch (llm.provider) {
    case 'bedrock': {
      const { credentials } = aws
      const bedrock = credentials
        ? createAmazonBedrock({
            region: aws.region,
            accessKeyId: credentials.accessKeyId,
            secretAccessKey: credentials.secretAccessKey,
            sessionToken: credentials.sessionToken,
          })
        : createAmazonBedrock({
            region: aws.region,
            credentialProvider: fromNodeProviderChain({ profile: aws.profile }),
          })
      return bedrock(llm.modelId)
    }
    case 'google': {
      if (!llm.apiKey) {
        throw new ConfigurationError('The google provider needs an API key.')
      }
      const google = createGoogleGenerativeAI({ apiKey: llm.apiKey })
      return google(llm.modelId)
    }
    default: {
      const unsupported: never = llm.provider
      throw new ConfigurationError(`Unsupported LLM provider: ${unsupported}`)
    }
  }
}
