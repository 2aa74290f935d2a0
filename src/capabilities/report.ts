import { renderTable } from "../terminal/table.js";
import { plainTheme, theme as richTheme } from "../terminal/theme.js";
import type { CapabilityStatusEntry } from "./types.js";

export type CapabilitySummary = {
  total: number;
  available: number;
  unavailable: number;
};

export function summarizeCapabilities(entries: CapabilityStatusEntry[]): CapabilitySummary {
  const available = entries.filter((entry) => entry.status === "available").length;
  return { total: entries.length, available, unavailable: entries.length - available };
}

function statusLabel(entry: CapabilityStatusEntry): string {
  if (entry.status === "available") return "available";
  return entry.kind === "disabled" ? "disabled" : "unavailable";
}

/** One-shot "what can this library do here" report for terminals and logs. */
export function renderCapabilityReport(
  entries: CapabilityStatusEntry[],
  opts: { rich?: boolean } = {},
): string {
  const theme = opts.rich ? richTheme : plainTheme;
  const summary = summarizeCapabilities(entries);
  const lines = [theme.heading("Capabilities")];

  if (entries.length === 0) {
    lines.push(theme.muted("No capabilities registered."));
    return lines.join("\n");
  }

  const rows = entries.map((entry) => {
    const label = statusLabel(entry);
    const status =
      label === "available"
        ? theme.success(label)
        : label === "disabled"
          ? theme.muted(label)
          : theme.warn(label);
    const detail =
      entry.status === "available" ? (entry.summary ?? "") : theme.muted(entry.reason ?? "");
    return {
      name: entry.name,
      status,
      packages: entry.packages.join(", "),
      detail,
    };
  });

  lines.push(
    renderTable({
      columns: [
        { key: "name", header: "Capability" },
        { key: "status", header: "Status" },
        { key: "packages", header: "Packages" },
        { key: "detail", header: "Detail" },
      ],
      rows,
    }),
  );
  lines.push(`${summary.available}/${summary.total} available`);
  return lines.join("\n");
}
