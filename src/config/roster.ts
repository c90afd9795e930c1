import type { Entity, Roster } from '../types/digest';

export interface RosterEntry {
  name: string;
  aliases: string[];
  contextKeywords?: string[];
}

function freezeEntity(entry: RosterEntry): Entity {
  return Object.freeze({
    name: entry.name,
    aliases: Object.freeze([...entry.aliases]),
    contextKeywords: Object.freeze([...(entry.contextKeywords ?? [])])
  });
}

/**
 * Freeze a roster, rejecting entries without aliases and repeated names.
 */
export function defineRoster(entries: readonly RosterEntry[]): Roster {
  const names = new Set<string>();
  return Object.freeze(
    entries.map(entry => {
      if (entry.aliases.length === 0) {
        throw new Error(`Roster entry "${entry.name}" needs at least one alias`);
      }
      if (names.has(entry.name)) {
        throw new Error(`Duplicate roster entry: ${entry.name}`);
      }
      names.add(entry.name);
      return freezeEntity(entry);
    })
  );
}

/**
 * Watched clients. Order matters: an item goes to the first entry it matches,
 * so a "London Market FOIL" story that also satisfies FOIL's context lands under FOIL.
 */
export const CLIENTS: Roster = defineRoster([
  { name: '4PB', aliases: ['4PB', '4 Paper Buildings', 'Four Paper Buildings'], contextKeywords: ['barristers', 'family', 'chambers', 'court', 'law'] },
  { name: 'Bolt Burdon Kemp', aliases: ['Bolt Burdon Kemp', 'BBK'], contextKeywords: ['law', 'solicitors', 'firm', 'claims', 'clinical negligence', 'PI'] },
  { name: 'Cooke Young & Keidan', aliases: ['Cooke Young & Keidan', 'CYK'], contextKeywords: ['law', 'litigation', 'disputes', 'London'] },
  { name: 'FOIL', aliases: ['FOIL', 'Forum of Insurance Lawyers'], contextKeywords: ['insurance', 'law', 'solicitors', 'claims'] },
  { name: 'London Market FOIL', aliases: ['London Market FOIL'], contextKeywords: ['insurance', 'London Market', 'law'] },
  { name: 'LSLA', aliases: ['LSLA', 'London Solicitors Litigation Association'], contextKeywords: ['litigation', 'solicitors', 'law'] },
  { name: 'Nottingham Law School', aliases: ['Nottingham Law School', 'NLS'], contextKeywords: ['Nottingham', 'students', 'legal', 'university', 'Trent'] },
  { name: 'Oury Clark', aliases: ['Oury Clark', 'OuryClark'], contextKeywords: ['law', 'accounting', 'solicitors', 'firm'] },
  { name: 'Alto Claritas', aliases: ['Alto Claritas'], contextKeywords: ['legal', 'law', 'solicitors'] },
  { name: 'SA Law', aliases: ['SA Law', 'SALaw'], contextKeywords: ['law', 'solicitors', 'St Albans', 'Watford'] },
  { name: 'Wilsons', aliases: ['Wilsons Solicitors', 'Wilsons LLP', 'Wilsons (Salisbury)', 'Wilsons'], contextKeywords: ['law', 'solicitors', 'firm', 'Salisbury'] }
]);
