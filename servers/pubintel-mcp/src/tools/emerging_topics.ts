import type { AnalysisService } from '../engine/service.js';
import { errorContent, jsonContent, today } from './respond.js';
import type { TopicSweepParams } from './schemas.js';

export async function emergingTopics(service: AnalysisService, params: TopicSweepParams) {
  try {
    const result = await service.emergingTopics({ ...params, untilPubDate: params.untilPubDate ?? today() });
    return jsonContent(result);
  } catch (error) {
    return errorContent(error);
  }
}
