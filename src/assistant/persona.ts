/**
 * Assistant persona, read from a JSON file and reloaded when the file changes
 */

import { promises as fs } from 'fs';
import { z } from 'zod';
import { AppLogger, createAssistantLogger, toError } from '../utils/logger';

const stringList = z.array(z.string());

export const personaSchema = z
  .object({
    identity: z.object({ name: z.string().optional() }).passthrough().optional(),
    essence: z
      .object({
        who_i_am: z.string().optional(),
        what_drives_me: z.string().optional()
      })
      .passthrough()
      .optional(),
    company: z
      .object({
        name: z.string().optional(),
        mission: z.string().optional()
      })
      .passthrough()
      .optional(),
    voice: z
      .object({
        style: z.string().optional(),
        characteristics: stringList.optional(),
        when_to_ask_questions: stringList.optional()
      })
      .passthrough()
      .optional(),
    context_notes: stringList.optional()
  })
  .passthrough();

export type Persona = z.infer<typeof personaSchema>;

export const DEFAULT_PERSONA_NAME = 'Arjo';

export function defaultPersona(): Persona {
  return {
    identity: { name: DEFAULT_PERSONA_NAME },
    voice: { style: 'friendly', characteristics: ['Be helpful and direct'] }
  };
}

export function personaName(persona: Persona): string {
  return persona.identity?.name ?? DEFAULT_PERSONA_NAME;
}

/**
 * "Who I Am" lines: essence, drive, mission, voice, then context notes
 */
export function buildPersonaContext(persona: Persona): string {
  const parts: string[] = [];

  if (persona.essence?.who_i_am) {
    parts.push(persona.essence.who_i_am);
  }
  if (persona.essence?.what_drives_me) {
    parts.push(`What drives me: ${persona.essence.what_drives_me}`);
  }

  if (persona.company?.mission) {
    parts.push(`${persona.company.name || 'Our company'}'s mission: ${persona.company.mission}`);
  }

  const characteristics = persona.voice?.characteristics ?? [];
  if (characteristics.length > 0) {
    parts.push(`How I communicate: ${characteristics.join('; ')}`);
  }
  const whenToAsk = persona.voice?.when_to_ask_questions ?? [];
  if (whenToAsk.length > 0) {
    parts.push(`I ask questions when: ${whenToAsk.join('; ')}`);
  }

  const notes = persona.context_notes ?? [];
  if (notes.length > 0) {
    parts.push(`Current context: ${notes.join('; ')}`);
  }

  return parts.join('\n');
}

export interface PersonaProvider {
  load(): Promise<Persona>;
}

export class PersonaLoader implements PersonaProvider {
  private cache: { persona: Persona; mtimeMs: number } | null = null;
  private readonly logger: AppLogger;

  constructor(private readonly filePath: string, logger?: AppLogger) {
    this.logger = logger || createAssistantLogger().createSubLogger('persona');
  }

  async load(): Promise<Persona> {
    let mtimeMs: number;
    try {
      mtimeMs = (await fs.stat(this.filePath)).mtimeMs;
    } catch {
      this.cache = null;
      return defaultPersona();
    }

    if (this.cache && this.cache.mtimeMs === mtimeMs) {
      return this.cache.persona;
    }

    try {
      const raw: unknown = JSON.parse(await fs.readFile(this.filePath, 'utf8'));
      const persona = personaSchema.parse(raw);
      this.cache = { persona, mtimeMs };
      this.logger.debug(`Loaded persona ${personaName(persona)} from ${this.filePath}`);
      return persona;
    } catch (error) {
      this.logger.warn(`Invalid persona file ${this.filePath}: ${toError(error).message}`);
      this.cache = null;
      return defaultPersona();
    }
  }
}
