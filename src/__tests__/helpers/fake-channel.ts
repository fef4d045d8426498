import { Duplex } from 'stream'

// A shell channel whose remote end answers each write with scripted chunks
export function fakeChannel(respond: (input: string) => string[]) {
  const written: string[] = []
  const stream: Duplex = new Duplex({
    read() {},
    write(chunk: Buffer, _encoding, callback) {
      const input = chunk.toString()
      written.push(input)
      const replies = respond(input)
      setImmediate(() => {
        for (const reply of replies) stream.push(reply)
      })
      callback()
    },
  })
  return { stream, written }
}

// Let scheduled replies and stream events land
export function flush(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve))
}
