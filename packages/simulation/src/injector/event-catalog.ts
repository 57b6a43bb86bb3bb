import { CONFIG_FILES } from "../config/loader.js";
import type { EventDefinition, EventsFile } from "../config/schemas.js";
import { ConfigurationError } from "../errors.js";

export type EventKind =
  | { tag: "defined"; id: string; definition: EventDefinition }
  | { tag: "unknown"; id: string };

export class EventCatalog {
  private readonly events: ReadonlyMap<string, EventDefinition>;

  constructor(file: EventsFile) {
    this.events = new Map(Object.entries(file.events));
  }

  kind(id: string): EventKind {
    const definition = this.events.get(id);
    return definition ? { tag: "defined", id, definition } : { tag: "unknown", id };
  }

  get(id: string): EventDefinition {
    const kind = this.kind(id);
    if (kind.tag === "unknown") {
      throw new ConfigurationError(`unknown event '${id}'`, { file: CONFIG_FILES.events, key: `events.${id}` });
    }
    return kind.definition;
  }

  ids(): string[] {
    return [...this.events.keys()];
  }
}
