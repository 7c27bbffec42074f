export * from "./host.js";
export * from "./remoting.js";
export * from "./wmi.js";
export * from "./cluster.js";
export * from "./status.js";
export * from "./guests.js";
