export { ToolRegistry, type ToolDefinition, type ToolHandler } from './registry.js';
export { createTodaysDateTool, formatDate, DATE_FORMATS, type DateFormat } from './todays_date.js';
