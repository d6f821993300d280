import { PostHog } from 'posthog-node'
import { AnalyticsConfig, isPlaceholder } from './feedback/config'
import { Logger } from './logger'

export interface Analytics {
  trackEvent(event: string, distinctId: string, properties?: Record<string, unknown>): void
  shutdown(): Promise<void>
}

const noopAnalytics: Analytics = {
  trackEvent: () => undefined,
  shutdown: async () => undefined
}

export function createAnalytics(config: AnalyticsConfig): Analytics {
  if (isPlaceholder(config.apiKey)) {
    return noopAnalytics
  }

  const client = new PostHog(config.apiKey, {
    host: config.host,
    flushAt: 1, // Flush immediately since we're in a serverless function
    flushInterval: 0 // Disable automatic flushing
  })

  return {
    trackEvent(event, distinctId, properties) {
      try {
        client.capture({ distinctId, event, properties })
      } catch (error) {
        Logger.error('PostHog tracking error:', error)
      }
    },

    // Ensure events are sent before the function terminates
    async shutdown() {
      try {
        await client.shutdown()
      } catch (error) {
        Logger.error('PostHog shutdown error:', error)
      }
    }
  }
}
