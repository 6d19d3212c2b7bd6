import type { DetectionVerdict, HeaderBag } from "./types";

type HostileVerdict = Exclude<DetectionVerdict, "normal">;

interface HeaderSignature {
  verdict: HostileVerdict;
  header: string;
  value?: RegExp;
  evidence: string;
}

interface BodyPattern {
  verdict: HostileVerdict;
  regex: RegExp;
  evidence: string;
}

const HEADER_SIGNATURES: HeaderSignature[] = [
  {
    verdict: "cloudflare_challenge",
    header: "cf-mitigated",
    value: /challenge/i,
    evidence: "cf-mitigated header",
  },
  { verdict: "cloudflare_challenge", header: "cf-chl-bypass", evidence: "cf-chl-bypass header" },
  { verdict: "waf_detected", header: "x-waf-event", evidence: "x-waf-event header" },
  { verdict: "waf_detected", header: "x-waf-event-info", evidence: "x-waf-event-info header" },
  { verdict: "waf_detected", header: "x-security-check", evidence: "x-security-check header" },
  { verdict: "waf_detected", header: "x-sucuri-block", evidence: "x-sucuri-block header" },
  { verdict: "waf_detected", header: "x-denied-reason", evidence: "x-denied-reason header" },
];

// Evaluated in order; the first matching verdict wins.
const BODY_PATTERNS: BodyPattern[] = [
  {
    verdict: "captcha",
    regex: /\b(captcha|hcaptcha|recaptcha|verify you are human|are you a robot|human verification)\b/i,
    evidence: "captcha marker",
  },
  {
    verdict: "captcha",
    regex: /(验证码|人机验证|滑动验证|请完成安全验证|请输入验证码)/,
    evidence: "captcha marker (zh)",
  },
  {
    verdict: "rate_limited",
    regex: /\b(too many requests|rate limit(ed)?|request limit exceeded)\b/i,
    evidence: "throttling marker",
  },
  {
    verdict: "rate_limited",
    regex: /(访问过于频繁|请求过于频繁|访问频率过高|请稍后再试)/,
    evidence: "throttling marker (zh)",
  },
  {
    verdict: "waf_detected",
    regex: /\b(web application firewall|security service|request was blocked by (the )?security|mod_security|incapsula incident)\b/i,
    evidence: "firewall marker",
  },
  {
    verdict: "waf_detected",
    regex: /(防火墙|安全防护|网站防护|安全狗|云盾)/,
    evidence: "firewall marker (zh)",
  },
  {
    verdict: "cloudflare_challenge",
    regex: /(checking your browser|just a moment\.\.\.|cf-browser-verification|challenge-platform|attention required! \| cloudflare)/i,
    evidence: "challenge page marker",
  },
  {
    verdict: "blocked",
    regex: /\b(access denied|403 forbidden|you have been blocked|request blocked)\b/i,
    evidence: "access denied marker",
  },
  {
    verdict: "blocked",
    regex: /(访问被拒绝|禁止访问|拒绝访问|您的访问已被阻止|已被封禁|已被拦截)/,
    evidence: "access denied marker (zh)",
  },
];

const BODY_SCAN_LIMIT = 120_000;

const headerValue = (headers: HeaderBag, name: string): string | null => {
  for (const [key, raw] of Object.entries(headers)) {
    if (key.toLowerCase() !== name) continue;
    if (raw === undefined) return null;
    return Array.isArray(raw) ? raw.join(", ") : raw;
  }
  return null;
};

export const matchHeaderSignature = (
  headers: HeaderBag,
): { verdict: HostileVerdict; evidence: string } | null => {
  for (const signature of HEADER_SIGNATURES) {
    const value = headerValue(headers, signature.header);
    if (value === null) continue;
    if (signature.value && !signature.value.test(value)) continue;
    return { verdict: signature.verdict, evidence: signature.evidence };
  }
  return null;
};

export const matchBodyPattern = (
  body: string,
): { verdict: HostileVerdict; evidence: string } | null => {
  const sample = body.slice(0, BODY_SCAN_LIMIT);
  for (const pattern of BODY_PATTERNS) {
    if (pattern.regex.test(sample)) {
      return { verdict: pattern.verdict, evidence: pattern.evidence };
    }
  }
  return null;
};
