/**
 * Proxy Node Schema
 * The node record passed through the conversion pipeline and into scripts
 */

import { z } from "zod";
import { ValidationError, type LogContext } from "@subfilter/core";

export const PROXY_TYPES = [
  "unknown",
  "shadowsocks",
  "shadowsocksr",
  "vmess",
  "vless",
  "trojan",
  "snell",
  "http",
  "https",
  "socks5",
  "wireguard",
  "hysteria",
  "hysteria2",
] as const;

export const ProxyTypeSchema = z.enum(PROXY_TYPES);
export type ProxyType = z.infer<typeof ProxyTypeSchema>;

export const ProxyNodeSchema = z.object({
  type: ProxyTypeSchema.default("unknown"),
  id: z.number().int().nonnegative().default(0),
  groupId: z.number().int().default(0),
  group: z.string().default(""),
  remark: z.string().default(""),
  hostname: z.string(),
  port: z.number().int().min(0).max(65535),

  // Credentials
  username: z.string().optional(),
  password: z.string().optional(),
  encryptMethod: z.string().optional(),
  userId: z.string().optional(),
  alterId: z.number().int().optional(),

  // Plugin / obfuscation
  plugin: z.string().optional(),
  pluginOption: z.string().optional(),
  protocol: z.string().optional(),
  protocolParam: z.string().optional(),
  obfs: z.string().optional(),
  obfsParam: z.string().optional(),

  // Transport
  transferProtocol: z.string().optional(),
  host: z.string().optional(),
  path: z.string().optional(),
  tlsSecure: z.boolean().optional(),
  serverName: z.string().optional(),

  // Capabilities (unset means "inherit")
  udp: z.boolean().optional(),
  tcpFastOpen: z.boolean().optional(),
  allowInsecure: z.boolean().optional(),
  tls13: z.boolean().optional(),
});

export type ProxyNode = z.infer<typeof ProxyNodeSchema>;

/**
 * Validate an unknown list of nodes
 */
export function parseProxyNodes(input: unknown): ProxyNode[] {
  const result = z.array(ProxyNodeSchema).safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path.join(".") ?? "";
    throw new ValidationError(`Invalid proxy node list at ${field || "<root>"}: ${issue?.message}`, {
      field,
      context: { issues: result.error.issues.length },
    });
  }
  return result.data;
}

/**
 * Log context identifying a node
 */
export function describeNode(node: ProxyNode, index: number): LogContext {
  return {
    nodeIndex: index,
    remark: node.remark,
    server: `${node.hostname}:${node.port}`,
  };
}
