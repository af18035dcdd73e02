export const latin1 = (bytes: Uint8Array): string => {
	return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('latin1');
};

export const hex = (value: number): string => {
	return value.toString(16).toUpperCase().padStart(2, '0');
};
