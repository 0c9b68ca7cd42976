import type { APIEmbed } from "discord-api-types/v10";
import type { PresenceSink } from "./presence";
import type { ArtifactSink } from "./publish";

/** Plain-text rendering of an embed, for the terminal. */
export function embedToText(embed: APIEmbed): string {
  const lines: string[] = [];
  if (embed.author) lines.push(`[${embed.author.name}]`);
  if (embed.title) lines.push(embed.title);
  for (const field of embed.fields ?? []) {
    lines.push("");
    lines.push(`## ${field.name}`);
    lines.push(field.value);
  }
  if (embed.footer) {
    lines.push("");
    lines.push(`-- ${embed.footer.text}${embed.timestamp ? ` ${embed.timestamp}` : ""}`);
  }
  return lines.join("\n");
}

/** Prints the dashboard instead of posting it; IDs count up from 1. */
export class ConsoleArtifactSink implements ArtifactSink {
  private nextId = 1;

  async create(embed: APIEmbed): Promise<string> {
    const id = `preview-${this.nextId++}`;
    console.log(`\n${embedToText(embed)}\n`);
    return id;
  }

  async update(_artifactId: string, embed: APIEmbed): Promise<"ok"> {
    console.log(`\n${embedToText(embed)}\n`);
    return "ok";
  }
}

export class ConsolePresenceSink implements PresenceSink {
  async setPresence(text: string): Promise<void> {
    console.log(`🎭 Presence: ${text}`);
  }
}
