import type { AnalysisService } from '../engine/service.js';
import { errorContent, jsonContent, today } from './respond.js';
import type { GapAnalysisParams } from './schemas.js';

export async function gapAnalysis(service: AnalysisService, params: GapAnalysisParams) {
  try {
    const result = await service.gapAnalysis({ ...params, untilPubDate: params.untilPubDate ?? today() });
    return jsonContent(result);
  } catch (error) {
    return errorContent(error);
  }
}
