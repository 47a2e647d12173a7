export {};

throw new Error("reserved modules must not be loaded");
