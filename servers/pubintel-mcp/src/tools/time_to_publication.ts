import type { AnalysisService } from '../engine/service.js';
import { errorContent, jsonContent, today } from './respond.js';
import type { AnalyzeParams } from './schemas.js';

export async function timeToPublication(service: AnalysisService, params: AnalyzeParams) {
  try {
    const result = await service.timeToPublication({ ...params, untilPubDate: params.untilPubDate ?? today() });
    return jsonContent(result);
  } catch (error) {
    return errorContent(error);
  }
}
