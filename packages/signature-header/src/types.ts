export type SignatureParam = { key: string; value: string };
