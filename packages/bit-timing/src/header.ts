import { InvalidArgumentError } from "./errors";
import type { BitTimingConfig } from "./timing";

export type Define = {
  name: string;
  value: number | string;
};

export type HeaderOptions = {
  name: string;
  generatedAt: Date;
};

export const DEFAULT_HEADER_NAME = "can_baud";

export const renderDefine = (define: Define) =>
  `#define ${define.name.toUpperCase()} (${define.value})`;

export const headerDefines = (config: BitTimingConfig): Define[] => [
  { name: "CAN_BAUDRATE", value: config.baudRate },
  { name: "CAN_PRESCALER", value: config.prescaler },
  { name: "CAN_CLKS_PR_BIT", value: config.clocksPerBit },
  { name: "CAN_TBIT", value: config.timeQuantaPerBit },
  { name: "CAN_TSYNS", value: config.syncSegment },
  { name: "CAN_TPRS", value: config.propSegment },
  { name: "CAN_TPH1", value: config.phaseSeg1 },
  { name: "CAN_TPH2", value: config.phaseSeg2 },
  { name: "CAN_SJW", value: config.syncJumpWidth },
  { name: "CAN_ERR_RATE", value: config.errorRate },
];

export const registerDefines = (): Define[] => [
  { name: "CANBT1_VALUE", value: "(CAN_PRESCALER-1)<<BRP0" },
  { name: "CANBT2_VALUE", value: "((CAN_TPRS-1)<<PRS0) | ((CAN_SJW-1)<<SJW0)" },
  { name: "CANBT3_VALUE", value: "((CAN_TPH1-1)<<PHS10) | ((CAN_TPH2-1)<<PHS20)" },
];

export const guardName = (name: string) => {
  const trimmed = name.trim();
  if (!trimmed) {
    throw new InvalidArgumentError("name", name, "Header name must not be empty.");
  }
  // the guard is a C identifier: no leading digit, only [A-Z0-9_]
  const normalized = trimmed.toUpperCase().replace(/[^A-Z0-9_]/g, "_");
  return /^[0-9]/.test(normalized) ? `_${normalized}_H` : `${normalized}_H`;
};

const renderBlock = (config: BitTimingConfig, selectByBaudRate: boolean) => {
  const condition = selectByBaudRate
    ? `(F_CPU == ${config.cpuFrequency}) && (CAN_BAUDRATE == ${config.baudRate})`
    : `F_CPU == ${config.cpuFrequency}`;
  const defines = headerDefines(config).filter(
    (define) => !selectByBaudRate || define.name !== "CAN_BAUDRATE"
  );
  return [`#if ${condition}`, "", ...defines.map(renderDefine), "", `#endif /* ${condition} */`, ""];
};

/**
 * Renders a C header with one `#if` block per configuration. With more than
 * one configuration the including unit picks a block by defining
 * CAN_BAUDRATE itself.
 */
export const renderHeader = (configs: readonly BitTimingConfig[], options: HeaderOptions) => {
  if (configs.length === 0) {
    throw new InvalidArgumentError("configs", configs, "At least one configuration is required.");
  }
  const guard = guardName(options.name);
  const selectByBaudRate = configs.length > 1;

  const lines = [
    "/**",
    ` * Generated ${options.generatedAt.toISOString()}`,
    " * This file is machine generated and should not be altered by hand.",
    " */",
    "",
    `#ifndef ${guard}`,
    `#define ${guard}`,
    "",
  ];

  if (selectByBaudRate) {
    lines.push(
      "#ifndef CAN_BAUDRATE",
      '#error "CAN_BAUDRATE must be defined before including this header"',
      "#endif",
      ""
    );
  }

  for (const config of configs) {
    lines.push(...renderBlock(config, selectByBaudRate));
  }

  lines.push(
    "#ifndef CAN_PRESCALER",
    '#error "No CAN bit timing for this F_CPU and CAN_BAUDRATE"',
    "#endif",
    "",
    ...registerDefines().map(renderDefine),
    "",
    `#endif /* ${guard} */`,
    ""
  );
  return lines.join("\n");
};
