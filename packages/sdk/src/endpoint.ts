import type { ObjectDeserializer, ObjectSerializer, SerializableEntity } from "./codec.js";
import { InvalidArgumentError, MalformedDataError } from "./errors.js";

export type EndpointProtocol = "http" | "https";

export const DEFAULT_NODE_PORT = 7890;

const SCHEME_PORTS: Record<EndpointProtocol, number> = { http: 80, https: 443 };

// URL drops a port equal to the scheme default, so look at the text itself.
const EXPLICIT_PORT = /^[a-z][a-z0-9+.-]*:\/\/[^/?#]*:\d+(?:[/?#]|$)/i;

function isProtocol(v: string): v is EndpointProtocol {
  return v === "http" || v === "https";
}

/** Network location of a node, e.g. the one harvesting on an account's behalf. */
export class NodeEndpoint implements SerializableEntity {
  readonly protocol: EndpointProtocol;
  readonly host: string;
  readonly port: number;

  constructor(protocol: string, host: string, port: number) {
    if (!isProtocol(protocol)) throw new InvalidArgumentError(`Unsupported protocol: ${JSON.stringify(protocol)}`);
    if (host.trim() === "") throw new InvalidArgumentError("Endpoint host required");
    if (!Number.isInteger(port) || port < 1 || port > 0xffff) {
      throw new InvalidArgumentError(`Port out of range: ${port}`);
    }
    this.protocol = protocol;
    this.host = host.trim();
    this.port = port;
  }

  static fromHost(host: string): NodeEndpoint {
    return new NodeEndpoint("http", host, DEFAULT_NODE_PORT);
  }

  static fromUrl(url: string): NodeEndpoint {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch (e) {
      throw new InvalidArgumentError(`Invalid endpoint URL: ${JSON.stringify(url)}`, e);
    }
    const protocol = parsed.protocol.replace(/:$/, "");
    if (!isProtocol(protocol)) throw new InvalidArgumentError(`Unsupported protocol: ${JSON.stringify(protocol)}`);
    let port = DEFAULT_NODE_PORT;
    if (parsed.port !== "") port = Number(parsed.port);
    else if (EXPLICIT_PORT.test(url.trim())) port = SCHEME_PORTS[protocol];
    return new NodeEndpoint(protocol, parsed.hostname, port);
  }

  static deserialize(deserializer: ObjectDeserializer): NodeEndpoint {
    const protocol = deserializer.readString("protocol");
    const host = deserializer.readString("host");
    const port = deserializer.readInt("port");
    try {
      return new NodeEndpoint(protocol, host, port);
    } catch (e) {
      if (!(e instanceof InvalidArgumentError)) throw e;
      throw new MalformedDataError(e.message, deserializer.path || undefined, e);
    }
  }

  serialize(serializer: ObjectSerializer): void {
    serializer.writeString("protocol", this.protocol);
    serializer.writeString("host", this.host);
    serializer.writeInt("port", this.port);
  }

  toUrl(): string {
    return `${this.protocol}://${this.host}:${this.port}`;
  }

  equals(other: NodeEndpoint): boolean {
    return this.protocol === other.protocol && this.host === other.host && this.port === other.port;
  }

  toString(): string {
    return this.toUrl();
  }
}
