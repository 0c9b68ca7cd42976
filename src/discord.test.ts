import type { APIEmbed } from "discord-api-types/v10";
import { describe, expect, it, vi } from "vitest";
import { DiscordMessageSink, RichPresenceSink } from "./discord";
import { ArtifactWriteError } from "./errors";
import type { FetchLike } from "./sources/http";

const embed: APIEmbed = { title: "Server is currently Online! :white_check_mark:" };

describe("DiscordMessageSink", () => {
  it("posts a new message with the bot token", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => new Response(JSON.stringify({ id: "111", channel_id: "123" })));
    const sink = new DiscordMessageSink("test-secret", "123", 10_000, fetchImpl);

    await expect(sink.create(embed)).resolves.toBe("111");

    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe("https://discord.com/api/v10/channels/123/messages");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({ Authorization: "Bot test-secret", "Content-Type": "application/json" });
    expect(init?.body).toBe(JSON.stringify({ embeds: [embed] }));
  });

  it("edits the message in place", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => new Response("{}"));
    const sink = new DiscordMessageSink("test-secret", "123", 10_000, fetchImpl);

    await expect(sink.update("111", embed)).resolves.toBe("ok");
    expect(fetchImpl.mock.calls[0][0]).toBe("https://discord.com/api/v10/channels/123/messages/111");
    expect(fetchImpl.mock.calls[0][1]?.method).toBe("PATCH");
  });

  it("reports a deleted message as not found", async () => {
    const sink = new DiscordMessageSink("test-secret", "123", 10_000, async () => new Response("{}", { status: 404 }));
    await expect(sink.update("111", embed)).resolves.toBe("notFound");
  });

  it("throws on other failures", async () => {
    const sink = new DiscordMessageSink("test-secret", "123", 10_000, async () => new Response("{}", { status: 403 }));
    const error = await sink.update("111", embed).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(ArtifactWriteError);
    expect(error).toMatchObject({ status: 403, message: "editing dashboard message failed: HTTP 403" });
  });
});

describe("RichPresenceSink", () => {
  it("refuses to set presence before connecting", async () => {
    const sink = new RichPresenceSink("123");
    await expect(sink.setPresence("1 active Stream 🟢")).rejects.toThrow("Discord RPC is not connected");
  });
});
