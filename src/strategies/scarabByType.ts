import { AnalysisSettings } from '../config/env';
import { AnalysisResult, Listing, MarketSnapshot } from '../types';
import { analyzeGroups, groupListings } from './recipePool';
import { Strategy, StrategyContext } from './strategy';

const SCARAB_TYPE = /(\w+)\sScarab|Scarab\sof\s(\w+)/;

/** "Ambush Scarab of Containment" → "Ambush"; "Scarab of Stability" → "Stability". */
export const scarabType = (listing: Listing): string | null => {
  const match = SCARAB_TYPE.exec(listing.name);
  if (!match) return null;
  return match[1] ?? match[2] ?? null;
};

export class ScarabByTypeStrategy implements Strategy {
  readonly name = 'Scarab Flip by Type';

  constructor(private settings: AnalysisSettings) {}

  analyze(snapshot: MarketSnapshot, context: StrategyContext): AnalysisResult[] {
    const scarabs = snapshot.Scarab ?? [];
    if (scarabs.length === 0) return [];
    return analyzeGroups(groupListings(scarabs, scarabType), 'Scarab Type', this.settings, context);
  }
}
