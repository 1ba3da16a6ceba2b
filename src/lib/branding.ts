export const PRODUCT_NAME = 'NVDA Portable Builder';
export const CLI_NAME = 'nvda-portable';

export const CONFIG_FILE_NAME = 'nvda-portable.config.json';
export const DEFAULT_LOG_FILE = 'nvda-portable.log';
export const BUILD_RESULT_FILE = 'build-result.json';
