import sharp from "sharp";

export interface Thumbnailer {
  /** Returns JPEG bytes of a downscaled preview of the image in `source`. */
  thumbnail(source: Buffer): Promise<Buffer>;
}

export const THUMB_MAX_EDGE = 256;

export class SharpThumbnailer implements Thumbnailer {
  constructor(private readonly maxEdge = THUMB_MAX_EDGE) {}

  async thumbnail(source: Buffer): Promise<Buffer> {
    return sharp(source, { animated: false })
      .rotate()
      .resize(this.maxEdge, this.maxEdge, { fit: "inside", withoutEnlargement: true })
      .flatten({ background: "#ffffff" })
      .jpeg({ quality: 80 })
      .toBuffer();
  }
}
