// Core domain types for Session Scribe

// Inbound chat events, normalized from the transport
export type InboundEventType = 'document' | 'audio' | 'voice' | 'text' | 'callback';

export interface InboundEvent {
  type: InboundEventType;
  chatId: string;
  fileRef?: string;
  mimeType?: string;
  callbackData?: string;
  callbackId?: string;
  text?: string;
}

// Interactive control rendered under an outbound message
export interface ChatControl {
  label: string;
  token: string;
}

// Pipeline stages, in execution order
export type TaskStage = 'fetch' | 'transcode' | 'transcribe' | 'generate' | 'deliver';
export type TaskStatus = 'pending' | 'running' | 'completed' | 'failed';

// Review workflow
export type ReviewAction = 'edit_subject' | 'edit_message' | 'send_email';
export type ReportField = 'subject' | 'message';

export interface StagedReport {
  reportId: string;
  subject: string;
  body: string;
}

export interface PendingInputRequest {
  reportId: string;
  field: ReportField;
}

// Error taxonomy shared by the pipeline and the review workflow
export type ErrorKind =
  | 'transport_failure'
  | 'no_audio_stream'
  | 'transcode_failure'
  | 'transcription_failure'
  | 'generation_failure'
  | 'not_found'
  | 'unexpected';

// Queue statistics as reported by the admin API
export interface QueueStats {
  pending: number;
  running: number;
  completed: number;
  failed: number;
  deadLetter: number;
}
