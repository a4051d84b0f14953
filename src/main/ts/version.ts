export const NAME = "noteg-lang";
export const VERSION = "0.1.0";
