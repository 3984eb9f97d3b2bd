// biome-ignore lint/style/noDefaultExport: config files use default export by convention
export default { tickInterval: -5 };
