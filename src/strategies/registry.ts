import { Config } from '../config/env';
import { Logger } from '../utils/logger';
import { GemLevelingStrategy } from './gemLeveling';
import { ScarabByTypeStrategy } from './scarabByType';
import { ScarabFullGambleStrategy } from './scarabFullGamble';
import { Strategy } from './strategy';
import { TattooFlipStrategy } from './tattooFlip';

/** Registration order is also the ranking tie-break. */
export const createStrategies = (config: Config, logger: Logger): Strategy[] => [
  new ScarabFullGambleStrategy(config.analysis),
  new ScarabByTypeStrategy(config.analysis),
  new TattooFlipStrategy(config.analysis),
  new GemLevelingStrategy(config.strategies.gemCorruption, logger.child('gems')),
];
