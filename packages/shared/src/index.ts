export * from "./types/firewall";
export * from "./types/target";
export * from "./types/report";
