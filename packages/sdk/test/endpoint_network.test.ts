import { describe, expect, it } from "vitest";
import { ObjectDeserializer, serializeToObject } from "../src/codec.js";
import { DEFAULT_NODE_PORT, NodeEndpoint } from "../src/endpoint.js";
import { InvalidArgumentError, MalformedDataError } from "../src/errors.js";
import { MAINNET, resolveNetworkConfig, TESTNET } from "../src/network.js";

describe("NodeEndpoint", () => {
  it("defaults to http on the node port", () => {
    const ep = NodeEndpoint.fromHost("example.org");
    expect(ep.protocol).toBe("http");
    expect(ep.port).toBe(DEFAULT_NODE_PORT);
    expect(ep.toUrl()).toBe("http://example.org:7890");
  });

  it("parses URLs", () => {
    const ep = NodeEndpoint.fromUrl("https://node.example:7891");
    expect(ep.equals(new NodeEndpoint("https", "node.example", 7891))).toBe(true);
    expect(NodeEndpoint.fromUrl("https://node.example").port).toBe(7890);
  });

  it("keeps an explicit port equal to the scheme default", () => {
    expect(NodeEndpoint.fromUrl("https://node.example:443").port).toBe(443);
    expect(NodeEndpoint.fromUrl("http://node.example:80/").port).toBe(80);
    expect(NodeEndpoint.fromUrl("http://[::1]/").port).toBe(7890);
    expect(NodeEndpoint.fromUrl("http://[::1]:80").toUrl()).toBe("http://[::1]:80");
  });

  it("rejects bad locations", () => {
    expect(() => NodeEndpoint.fromUrl("ftp://node.example")).toThrow(InvalidArgumentError);
    expect(() => NodeEndpoint.fromUrl("not a url")).toThrow(InvalidArgumentError);
    expect(() => new NodeEndpoint("http", " ", 80)).toThrow("Endpoint host required");
    expect(() => new NodeEndpoint("http", "h", 0)).toThrow("Port out of range: 0");
  });

  it("serializes protocol, host and port", () => {
    const ep = NodeEndpoint.fromHost("127.0.0.1");
    expect(serializeToObject(ep)).toEqual({ protocol: "http", host: "127.0.0.1", port: 7890 });
    const back = NodeEndpoint.deserialize(new ObjectDeserializer(serializeToObject(ep)));
    expect(back.equals(ep)).toBe(true);
  });

  it("raises MalformedDataError for out-of-range fields", () => {
    const d = new ObjectDeserializer({ protocol: "http", host: "h", port: 70000 });
    expect(() => NodeEndpoint.deserialize(d)).toThrow(MalformedDataError);
    expect(() => NodeEndpoint.deserialize(d)).toThrow("Port out of range: 70000");
  });
});

describe("resolveNetworkConfig", () => {
  it("defaults to testnet", () => {
    expect(resolveNetworkConfig({})).toBe(TESTNET);
    expect(resolveNetworkConfig({ HARVESTKIT_NETWORK: "" })).toBe(TESTNET);
  });

  it("selects a preset by name", () => {
    expect(resolveNetworkConfig({ HARVESTKIT_NETWORK: " MainNet " })).toBe(MAINNET);
  });

  it("rejects unknown networks", () => {
    expect(() => resolveNetworkConfig({ HARVESTKIT_NETWORK: "devnet" })).toThrow('Unknown network: "devnet"');
  });
});
