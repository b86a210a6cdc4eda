/**
 * Purpose: Recognise CIDR and subnet phrasings and answer them with IPv4 arithmetic.
 */

import type { DomainEvaluator } from "../types.js";
import {
  addressInRange,
  assertPrefix,
  calculateMask,
  formatAddress,
  formatCidr,
  formatSubnetInfo,
  formatSubnetList,
  hostsInPrefix,
  nextSubnet,
  parseCidr,
  prefixFromMask,
  splitByHostCount,
  splitToSubnets,
  wildcardMask,
} from "./network_ipv4.js";
import { HandlerChain, claimed, createChainEvaluator, regexHandler, type Handler } from "./domain_shared.js";

const IP = String.raw`\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}`;
const CIDR = String.raw`${IP}/\d{1,2}`;

const CIDR_ANYWHERE = new RegExp(CIDR);
const IP_ANYWHERE = new RegExp(IP);
const KEYWORDS = ["subnet", "cidr", "netmask", "wildcard", "broadcast", "split"];

export function isNetworkExpression(expr: string): boolean {
  if (CIDR_ANYWHERE.test(expr)) return true;
  const lower = expr.toLowerCase();
  if (KEYWORDS.some((kw) => lower.includes(kw))) return true;
  if (lower.includes("hosts") && (IP_ANYWHERE.test(expr) || /\/\d{1,2}/.test(expr))) return true;
  if (lower.includes("mask") && lower.includes("/")) return true;
  if ((lower.includes("prefix for") || lower.includes("cidr for")) && IP_ANYWHERE.test(expr)) return true;
  return false;
}

function group(m: RegExpExecArray, index: number): string {
  return m[index] ?? "";
}

export function createNetworkHandlers(): Handler[] {
  return [
    regexHandler(
      "split-count",
      new RegExp(String.raw`(?:split|divide)\s+(${CIDR})\s+(?:to|into)\s+(\d+)\s+subnets?`),
      (m) => claimed(formatSubnetList(splitToSubnets(group(m, 1), Number(group(m, 2)))))
    ),
    regexHandler(
      "split-hosts",
      new RegExp(String.raw`(?:split|divide)\s+(${CIDR})\s+(?:to|into)\s+subnets?\s+(?:with|of)\s+(\d+)\s+hosts?`),
      (m) => claimed(formatSubnetList(splitByHostCount(group(m, 1), Number(group(m, 2)))))
    ),
    regexHandler(
      "host-count",
      new RegExp(String.raw`(?:how\s+many\s+)?hosts?\s+(?:in|for|count)?\s*(${CIDR})`),
      (m) => claimed(`${parseCidr(group(m, 1)).hostCount} hosts`)
    ),
    regexHandler("host-count-prefix", /(?:how\s+many\s+)?hosts?\s+(?:in|for)?\s*\/(\d{1,2})/, (m) =>
      claimed(`${hostsInPrefix(Number(group(m, 1)))} hosts`)
    ),
    regexHandler("info", new RegExp(String.raw`(?:subnet\s+)?info\s+(?:for\s+)?(${CIDR})`), (m) =>
      claimed(formatSubnetInfo(parseCidr(group(m, 1))))
    ),
    // Before "mask" so "wildcard mask /24" is not read as a netmask. Neither reads the first octet of an address as a prefix.
    regexHandler("wildcard", /wildcard\s+(?:mask\s+)?(?:for\s+)?\/?(\d{1,2})(?![\d.])/, (m) =>
      claimed(wildcardMask(assertPrefix(Number(group(m, 1)))))
    ),
    regexHandler("mask", /(?:subnet\s+)?(?:net)?mask\s+(?:for\s+)?\/?(\d{1,2})(?![\d.])/, (m) =>
      claimed(calculateMask(assertPrefix(Number(group(m, 1)))))
    ),
    regexHandler("prefix", new RegExp(String.raw`(?:prefix|cidr)\s+(?:for\s+)?(${IP})`), (m) =>
      claimed(`/${prefixFromMask(group(m, 1))}`)
    ),
    regexHandler("contains", new RegExp(String.raw`is\s+(${IP})\s+in\s+(${CIDR})`), (m) =>
      claimed(addressInRange(group(m, 1), group(m, 2)) ? "yes" : "no")
    ),
    regexHandler("next-subnet", new RegExp(String.raw`next\s+subnet\s+(?:after\s+)?(${CIDR})`), (m) =>
      claimed(nextSubnet(group(m, 1)))
    ),
    regexHandler("broadcast", new RegExp(String.raw`broadcast\s+(?:for|of|address)?\s*(${CIDR})`), (m) =>
      claimed(formatAddress(parseCidr(group(m, 1)).broadcast))
    ),
    regexHandler("network", new RegExp(String.raw`network\s+(?:for|of|address)?\s*(${CIDR})`), (m) =>
      claimed(formatCidr(parseCidr(group(m, 1))))
    ),
    regexHandler("cidr", new RegExp(String.raw`^(${CIDR})$`), (m) => claimed(formatSubnetInfo(parseCidr(group(m, 1))))),
  ];
}

export function createNetworkEvaluator(): DomainEvaluator {
  return createChainEvaluator({
    name: "network",
    matches: isNetworkExpression,
    chain: new HandlerChain(createNetworkHandlers()),
  });
}
