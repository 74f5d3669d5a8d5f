export const riskWeights = {
  impersonation: 1.25,
  domainAge: 1.0,
  lexicalSignals: 1.0,
  infrastructure: 0.8,
  abuseHeuristics: 1.0
} as const;

export type RiskModuleName = keyof typeof riskWeights;

export const suspiciousTlds = [
  "top",
  "xyz",
  "click",
  "gq",
  "cf",
  "tk",
  "ml",
  "work",
  "live",
  "loan",
  "cfd",
  "rest",
  "shop",
  "icu",
  "buzz"
];

export const phishingSuffixes = ["login", "secure", "verify", "support", "account", "auth", "update", "wallet"];

export const dynamicDnsTokens = ["duckdns", "no-ip", "ddns", "dynu", "hopto", "servehttp", "ngrok"];

export const disposableHostingHints = ["vps", "cheap", "hostfree", "freehost", "temp", "000webhost", "glitch.me", "web.app"];
