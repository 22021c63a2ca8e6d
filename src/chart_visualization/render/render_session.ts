import { Resvg } from "@resvg/resvg-js";

/** Host page a session draws: the SVG surface and its pixel frame. */
export type HostDocument = {
  svg: string;
  width: number;
  height: number;
  background: string;
};

/**
 * One headless drawing surface. Callers mount a document, draw, capture the raster,
 * then close; `withRenderSession` guarantees the close.
 */
export interface RenderSession {
  mount(document: HostDocument): void;
  draw(): void;
  capture(): Buffer;
  close(): void;
}

export type RenderSessionOptions = {
  fontFamily: string;
};

export type RenderSessionFactory = (options: RenderSessionOptions) => RenderSession;

function primaryFamily(fontFamily: string) {
  return fontFamily.split(",")[0]?.trim().replace(/^["']|["']$/g, "") || "Arial";
}

class ResvgRenderSession implements RenderSession {
  private document: HostDocument | null = null;
  private rendered: Buffer | null = null;
  private closed = false;

  constructor(private readonly options: RenderSessionOptions) {}

  mount(document: HostDocument) {
    this.assertOpen();
    this.document = document;
    this.rendered = null;
  }

  draw() {
    this.assertOpen();
    if (!this.document) {
      throw new Error("Render session has no mounted document.");
    }
    const resvg = new Resvg(this.document.svg, {
      background: this.document.background,
      fitTo: { mode: "width", value: this.document.width },
      font: { loadSystemFonts: true, defaultFontFamily: primaryFamily(this.options.fontFamily) },
    });
    this.rendered = resvg.render().asPng();
  }

  capture() {
    this.assertOpen();
    if (!this.rendered) {
      throw new Error("Render session captured before drawing.");
    }
    return this.rendered;
  }

  close() {
    this.closed = true;
    this.document = null;
    this.rendered = null;
  }

  private assertOpen() {
    if (this.closed) {
      throw new Error("Render session is closed.");
    }
  }
}

export const createResvgSession: RenderSessionFactory = (options) => new ResvgRenderSession(options);

export async function withRenderSession<T>(
  factory: RenderSessionFactory,
  options: RenderSessionOptions,
  use: (session: RenderSession) => Promise<T> | T
): Promise<T> {
  const session = factory(options);
  try {
    return await use(session);
  } finally {
    session.close();
  }
}
