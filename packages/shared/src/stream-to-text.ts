/**
 * Read a byte stream to the end and decode it as UTF-8 text.
 *
 * Chunks are decoded as they arrive so multi-byte characters split across
 * chunk boundaries are joined correctly.
 */
export async function streamToText(
	stream: ReadableStream<Uint8Array>,
	onChunk?: (bytesRead: number) => void,
): Promise<string> {
	const reader = stream.getReader()
	const decoder = new TextDecoder()
	let text = ""
	let bytesRead = 0

	while (true) {
		const { done, value } = await reader.read()

		if (done) {
			break
		}

		bytesRead += value.byteLength
		text += decoder.decode(value, { stream: true })
		onChunk?.(bytesRead)
	}

	return text + decoder.decode()
}
