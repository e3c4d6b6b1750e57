import { AnalysisSettings } from '../config/env';
import { AnalysisResult, Listing, MarketSnapshot } from '../types';
import { analyzeGroups, groupListings } from './recipePool';
import { Strategy, StrategyContext } from './strategy';

const TRIBE_MARKER = ' of the ';

export const tattooTribe = (listing: Listing): string | null => {
  const index = listing.name.indexOf(TRIBE_MARKER);
  if (index < 0) return null;
  const tribe = listing.name.slice(index + TRIBE_MARKER.length).split(' ')[0];
  return tribe ? tribe : null;
};

/** 3-to-1 tattoo vendor recipe, evaluated per tribe. Journey tattoos are not part of it. */
export class TattooFlipStrategy implements Strategy {
  readonly name = 'Tattoo Flip';

  constructor(private settings: AnalysisSettings) {}

  analyze(snapshot: MarketSnapshot, context: StrategyContext): AnalysisResult[] {
    const tattoos = (snapshot.Tattoo ?? []).filter((listing) => !listing.name.includes('Journey'));
    const groups = groupListings(tattoos, tattooTribe);
    if (groups.length === 0) return [];
    return analyzeGroups(groups, 'Tattoo', this.settings, context);
  }
}
