export type FeedbackState = 'normal' | 'submitting' | 'success' | 'error';

export type FeedbackField = 'name' | 'email' | 'message';

export interface FeedbackSubmission {
  name: string;
  email: string;
  message: string;
}

export type FeedbackErrorCode = 'validation' | 'server' | 'network';

export interface FeedbackError {
  message: string;
  code: FeedbackErrorCode;
  fields?: FeedbackField[];
}

export interface FeedbackResponse {
  success: boolean;
  backend?: string;
  error?: FeedbackError;
}
