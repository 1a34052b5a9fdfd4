import type { Readable } from "stream";

export async function streamToBuffer(stream: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];
  return new Promise<Buffer>((resolve, reject) => {
    stream.on("data", (chunk: Buffer | string) => {
      chunks.push(Buffer.from(chunk));
    });
    stream.on("error", (error: Error) => reject(error));
    stream.on("end", () => resolve(Buffer.concat(chunks)));
  });
}

export async function streamToString(stream: Readable): Promise<string> {
  return (await streamToBuffer(stream)).toString("utf8");
}
