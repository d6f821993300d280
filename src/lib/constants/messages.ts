import { FeedbackField } from '../core/types'

export const FEEDBACK_MESSAGES = {
  success: {
    title: 'Thank you',
    description: 'Your message has been received and will be reviewed by our team.'
  },
  error: {
    default: 'Failed to submit feedback',
    networkError: 'Network error occurred',
    retryLater: 'We could not save your message right now. Please try again later.',
    validation: 'Please fill in all required fields'
  },
  labels: {
    submit: 'Send Message',
    submitting: 'Sending...',
    name: 'Full Name',
    email: 'Email Address',
    message: 'Message'
  },
  placeholders: {
    name: 'Enter your full name',
    email: 'your.email@example.com',
    message: 'Please describe your inquiry in detail...'
  }
}

export function missingFieldsMessage(fields: FeedbackField[]): string {
  if (fields.length === 0) return FEEDBACK_MESSAGES.error.validation
  const labels = fields.map(field => FEEDBACK_MESSAGES.labels[field])
  return `${FEEDBACK_MESSAGES.error.validation}: ${labels.join(', ')}`
}
