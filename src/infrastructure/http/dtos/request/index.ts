export {
  WebhookRequestDto,
  QueryResultDto,
  IntentDto,
  OutputContextDto,
} from './webhook-request.dto';
