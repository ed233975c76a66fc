// Log assertions compare plain text
process.env.FORCE_COLOR = '0';

export {};
