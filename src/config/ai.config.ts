import { registerAs } from '@nestjs/config';
import { resolveModelSettings, type ModelSettings } from '../modules/core/utils/model-loader.util';

export default registerAs('ai', (): ModelSettings => resolveModelSettings(process.env));
