import type { AnalysisService } from '../engine/service.js';
import { jsonContent } from './respond.js';

export function getConfig(service: AnalysisService) {
  return jsonContent(service.describeConfig());
}
