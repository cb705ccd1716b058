export const CLI_NAME = 'fincalc';
export const CLI_VERSION = '0.1.0';
