import { formatFileSize, type AnalysisEvent, type AnalysisListener } from '@cudarch/catalog';
import { logger } from './logger.js';

/**
 * Render analysis progress through the logger
 */
export function createEventRenderer(): AnalysisListener {
  let lastPercent = -1;

  return (event: AnalysisEvent) => {
    switch (event.type) {
      case 'download-start':
        lastPercent = -1;
        logger.info(`Downloading ${event.filename}...`);
        logger.debug(`URL: ${event.url}`);
        break;
      case 'download-progress': {
        if (event.total <= 0) break;
        const percent = Math.floor((event.downloaded / event.total) * 1000) / 10;
        if (percent === lastPercent) break;
        lastPercent = percent;
        logger.progress(`Progress: ${percent.toFixed(1)}%`);
        break;
      }
      case 'download-done':
        logger.endProgress();
        logger.debug(`Downloaded ${formatFileSize(event.bytes)} to ${event.path}`);
        break;
      case 'extracted':
        logger.debug(`Extracted ${event.libraries} shared libraries from ${event.filename}`);
        break;
      case 'library-missing':
        logger.warn(`No library matching ${event.patterns.join(', ')} in ${event.filename}`);
        break;
      case 'inspecting':
        logger.debug(`Running: ${event.command} '${event.library}'`);
        break;
      case 'analyzed': {
        const { result } = event;
        if (result.status === 'failed') {
          logger.fail(`Error analyzing ${result.filename}: ${result.error ?? result.warnings.join('; ')}`);
          break;
        }
        logger.success(`Successfully analyzed ${result.filename}`);
        for (const warning of result.warnings) logger.warn(warning);
        logger.info(
          result.architectures.length > 0
            ? `  Architectures: ${result.architectures.join(', ')}`
            : '  No CUDA architectures found'
        );
        break;
      }
    }
  };
}
