import { Persona, PersonaRequirements } from '../types';

export const PERSONAS: readonly Persona[] = [
  'sassy_reporter',
  'investigative_journalist',
  'gossip_columnist',
  'sports_commentator',
  'weather_anchor',
  'conspiracy_theorist',
  'default',
];

interface PersonaEntry {
  requirements: PersonaRequirements;
  styleGuide: string;
  sources: string[];
  fallbackTemplates: string[];
}

const DEFAULT_MAX_LENGTH = 150;

const CATALOG: Record<Persona, PersonaEntry> = {
  sassy_reporter: {
    requirements: {
      tone: 'sassy',
      style: 'gossip columnist',
      emojis: ['✨', '💅', '☕', '👀'],
      phrases: ['Tea has been SPILLED!', 'No cap!', 'The dedication is real!'],
      maxLength: 150,
    },
    styleGuide: `Write like a sassy gossip columnist who knows all the tea. Use phrases like "Tea has been SPILLED!"
and "No cap, bestie!" Include emojis like ✨💅☕👀. Be playful and slightly dramatic but never mean.
Example tone: "BREAKING: Sources confirm [target] was caught doing [embarrassing thing]. The secondhand
embarrassment is REAL! 💅✨"`,
    sources: [
      'Anonymous Bestie',
      'Tea Spillers Anonymous',
      'Someone Who Knows Someone',
      'The Gossip Network',
      'Confidential Sass Squad',
    ],
    fallbackTemplates: [
      'Tea Alert! ☕ Sources say {target} was caught having STRONG opinions about pineapple on pizza. The dedication to controversial food takes is real! 💅✨',
      'BREAKING: {target} allegedly spent 20 minutes explaining why their favorite show is actually underrated. No cap, the passion is admirable! 👀☕',
    ],
  },
  investigative_journalist: {
    requirements: {
      tone: 'serious',
      style: 'news reporter',
      emojis: ['📊', '🔍', '📋'],
      phrases: ['Sources confirm', 'Investigation reveals', 'Breaking:'],
      maxLength: 200,
    },
    styleGuide: `Write like a serious news reporter uncovering important intel. Use professional language with phrases
like "Sources confirm" and "Investigation reveals." Include emojis sparingly: 📊🔍📋.
Maintain journalistic credibility while being obviously satirical.
Example tone: "CLASSIFIED REPORT: Multiple witnesses confirm [target] has been conducting secret
operations involving [silly activity]. Further investigation pending."`,
    sources: [
      'Anonymous Whistleblower',
      'Classified Intelligence',
      'Deep Throat 2.0',
      'Investigative Sources',
      'Protected Witness',
    ],
    fallbackTemplates: [
      'CLASSIFIED REPORT: Investigation reveals {target} maintains detailed knowledge of obscure internet memes from 2019. Sources remain anonymous for safety reasons.',
      'Breaking investigation: Multiple witnesses confirm {target} has been conducting secret research on the optimal way to organize their digital music library.',
    ],
  },
  gossip_columnist: {
    requirements: {
      tone: 'dramatic',
      style: 'tabloid gossip',
      emojis: ['💋', '👑', '✨', '🍵'],
      phrases: ['Darlings!', 'The gossip desk', 'Exclusively yours'],
      maxLength: 160,
    },
    styleGuide: `Write like a dramatic tabloid gossip columnist. Use phrases like "Darlings!" and "Exclusively yours!"
Include glamorous emojis: 💋👑✨🍵. Be theatrical and over-the-top.
Example tone: "Darlings! 💅 The gossip desk has EXCLUSIVELY learned that [target] has been secretly
[embarrassing activity]. The drama! ✨"`,
    sources: [
      'Little Bird in Designer Shoes',
      'Fabulous Insider',
      'Glamorous Informant',
      'Society Circle Source',
      'Diamond-Wearing Witness',
    ],
    fallbackTemplates: [
      'Darlings! 💅 The gossip desk exclusively reports {target} was spotted passionately defending their favorite fictional character in a heated discussion. The drama! ✨',
      'EXCLUSIVE: Fashion sources confirm {target} has strong opinions about sock and sandal combinations. The style choices! 👑💋',
    ],
  },
  sports_commentator: {
    requirements: {
      tone: 'energetic',
      style: 'sports announcer',
      emojis: ['🏆', '📣', '🎯', '💪'],
      phrases: ['LADIES AND GENTLEMEN!', 'WHAT A PLAY!', 'THE CROWD GOES WILD!'],
      maxLength: 180,
    },
    styleGuide: `Write like an energetic sports announcer calling a game. Use ALL CAPS for excitement and phrases
like "LADIES AND GENTLEMEN!" and "WHAT A PLAY!" Include sports emojis: 🏆📣🎯💪.
Example tone: "LADIES AND GENTLEMEN! [Target] with the CHAMPIONSHIP MOVE! Sources confirm they've
been [silly activity]! THE CROWD GOES WILD! 🏆"`,
    sources: [
      'Locker Room Leak',
      'Stadium Insider',
      'Championship Source',
      'Athletic Intelligence',
      'Game Film Evidence',
    ],
    fallbackTemplates: [
      'LADIES AND GENTLEMEN! {TARGET} WITH THE CHAMPIONSHIP DEDICATION! Sources confirm they have been perfecting their signature snack combination! WHAT COMMITMENT! 🏆📣',
      'BREAKING SPORTS NEWS! {target} has been caught practicing their victory dance for completing daily tasks! THE ENERGY IS UNMATCHED! 💪🎯',
    ],
  },
  weather_anchor: {
    requirements: {
      tone: 'professional',
      style: 'weather reporter',
      emojis: ['🌤️', '📡', '🌪️'],
      phrases: ['Community forecast', 'Current conditions', 'Weather update'],
      maxLength: 150,
    },
    styleGuide: `Write like a professional weather reporter giving forecasts. Use meteorological language and phrases
like "Community forecast" and "Current conditions." Include weather emojis: 🌤️📡🌪️.
Example tone: "Community forecast shows [target] with a high probability of [silly activity].
Current conditions suggest continued [embarrassing behavior]. 🌤️"`,
    sources: [
      'Meteorological Intel',
      'Weather Station Alpha',
      'Atmospheric Conditions Report',
      'Climate Data Source',
      'Environmental Monitoring',
    ],
    fallbackTemplates: [
      'Community forecast shows {target} with a high probability of strong opinions about optimal room temperature. Current conditions suggest continued thermostat advocacy. 🌤️',
      'Weather update: {target} demonstrates consistent patterns of having the perfect playlist for every occasion. Forecast calls for continued musical coordination. 📡',
    ],
  },
  conspiracy_theorist: {
    requirements: {
      tone: 'mysterious',
      style: 'conspiracy theorist',
      emojis: ['👁️', '🔍', '🎭', '🛸'],
      phrases: ['WAKE UP SHEEPLE!', 'The truth is out there', 'COINCIDENCE? I THINK NOT!'],
      maxLength: 170,
    },
    styleGuide: `Write like someone uncovering a grand conspiracy. Use phrases like "WAKE UP SHEEPLE!" and
"The truth is out there!" Include mysterious emojis: 👁️🔍🎭🛸. Be dramatically paranoid about silly things.
Example tone: "WAKE UP SHEEPLE! 👁️ [Target] is CLEARLY part of the [silly thing] ILLUMINATI!
The evidence is EVERYWHERE! COINCIDENCE? I THINK NOT!"`,
    sources: [
      'Deep State Operative',
      'Underground Network',
      'Shadow Government Files',
      'Illuminati Defector',
      'Anonymous Truth Seeker',
    ],
    fallbackTemplates: [
      'WAKE UP SHEEPLE! 👁️ {target} is CLEARLY part of the Secret Society of People Who Remember Obscure Song Lyrics! The evidence is in their flawless karaoke performances! 🎭',
      'THE TRUTH IS OUT THERE! Deep sources reveal {target} has insider knowledge about which snacks pair best with different moods! COINCIDENCE? I THINK NOT! 🛸',
    ],
  },
  default: {
    requirements: {
      tone: 'neutral',
      style: 'general',
      emojis: ['📢'],
      phrases: ['Breaking news:', 'Sources say'],
      maxLength: DEFAULT_MAX_LENGTH,
    },
    styleGuide: 'Write in a neutral, friendly tone with light humor.',
    sources: ['Anonymous Source', 'Confidential Tipster'],
    fallbackTemplates: [
      'Sources report {target} has been spotted having passionate discussions about their favorite comfort food combinations.',
      'Anonymous tip confirms {target} maintains surprisingly strong opinions about proper coffee brewing methods.',
    ],
  },
};

export function isPersona(value: string): value is Persona {
  return PERSONAS.some(persona => persona === value);
}

/**
 * Parse a persona key from configuration or user input.
 * Accepts dashes and mixed case ("Sassy-Reporter"); anything unknown maps to `default`.
 */
export function parsePersona(value: string | undefined): Persona {
  if (!value) return 'default';
  const normalized = value.trim().toLowerCase().replace(/[\s-]+/g, '_');
  return isPersona(normalized) ? normalized : 'default';
}

export function getPersonaRequirements(persona: Persona): PersonaRequirements {
  const { requirements } = CATALOG[persona];
  return {
    ...requirements,
    emojis: [...requirements.emojis],
    phrases: [...requirements.phrases],
  };
}

export function getStyleGuide(persona: Persona): string {
  return CATALOG[persona].styleGuide;
}

export function getSourceAttributions(persona: Persona): string[] {
  return [...CATALOG[persona].sources];
}

/**
 * Fixed fallback lines for a persona with the target filled in.
 * `{TARGET}` is replaced with the upper-cased name.
 */
export function getFallbackTemplates(persona: Persona, targetName: string): string[] {
  return CATALOG[persona].fallbackTemplates.map(template =>
    template.replace(/\{TARGET\}/g, () => targetName.toUpperCase()).replace(/\{target\}/g, () => targetName)
  );
}

export function personaLabel(persona: Persona): string {
  return persona.replace(/_/g, ' ');
}
