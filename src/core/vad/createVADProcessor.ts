import { DisabledVADProcessor } from './DisabledVADProcessor';
import { SpeechProbabilityModel, VADConfiguration, VoiceActivityDetector } from './types';
import { VADProcessor, VADProcessorOptions } from './VADProcessor';

export const createVADProcessor = (
  config: VADConfiguration,
  model: SpeechProbabilityModel,
  options: VADProcessorOptions
): VoiceActivityDetector => {
  if (!config.enabled) {
    return new DisabledVADProcessor('voice activity detection is turned off in settings');
  }

  const support = model.support();
  if (!support.supported) {
    options.logger?.warn('Speech model unsupported; VAD disabled', {
      model: model.name,
      reason: support.reason
    });
    return new DisabledVADProcessor(support.reason);
  }

  return new VADProcessor(model, config, options);
};
