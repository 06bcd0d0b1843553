export {
  SearchJobQueue,
  truncateError,
  type SearchJobQueueDeps,
  type SearchJobSnapshot,
  type SubmitOptions,
} from "./searchJobQueue";
export {
  deliverWebhook,
  type DeliverWebhookOptions,
  type WebhookPayload,
  type WebhookSender,
} from "./webhook";
