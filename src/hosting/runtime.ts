import type { Runtime, RuntimeDescriptor } from "./types";

const runtimes: Record<Runtime, RuntimeDescriptor> = {
    python: { name: "python", version: "3.11", linuxFxVersion: "Python|3.11" },
    node: { name: "node", version: "20", linuxFxVersion: "Node|20" },
    // Flex Consumption only hosts the isolated worker model.
    dotnet: { name: "dotnet-isolated", version: "8.0", linuxFxVersion: "DOTNET-ISOLATED|8.0" },
    java: { name: "java", version: "17", linuxFxVersion: "Java|17" },
    powershell: { name: "powershell", version: "7.4", linuxFxVersion: "PowerShell|7.4" },
};

export function resolveRuntime(runtime: Runtime): RuntimeDescriptor {
    return runtimes[runtime];
}

/** The `FUNCTIONS_WORKER_RUNTIME` value a classic plan would be given for this runtime. */
export function workerRuntimeOf(runtime: Runtime): string {
    return runtimes[runtime].name;
}
