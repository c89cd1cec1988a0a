import type { AnalysisService } from '../engine/service.js';
import { errorContent, jsonContent, today } from './respond.js';
import type { ComparePublishersParams } from './schemas.js';

export async function comparePublishers(service: AnalysisService, params: ComparePublishersParams) {
  try {
    const result = await service.comparePublishers({ ...params, untilPubDate: params.untilPubDate ?? today() });
    return jsonContent(result);
  } catch (error) {
    return errorContent(error);
  }
}
