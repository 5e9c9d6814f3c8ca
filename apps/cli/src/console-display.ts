import type { DisplayEvent, DisplaySink } from "@cavern/game";
import { type AsciiCharset, type Cavern, type CavernNode, renderAscii, SIMPLE_CHARSET } from "@cavern/maze";

/**
 * Text display for `-d`: prints the cavern whenever the phase label changes
 * and echoes error messages.
 */
export class ConsoleDisplay implements DisplaySink {
  private cavern?: Cavern;
  private position?: CavernNode;

  constructor(
    private readonly write: (text: string) => void = (text) => console.log(text),
    private readonly charset: AsciiCharset = SIMPLE_CHARSET,
  ) {}

  notify(event: DisplayEvent): void {
    switch (event.type) {
      case "cavern":
        this.cavern = event.cavern;
        break;
      case "position":
        this.position = event.node;
        break;
      case "phase":
        this.write(`== ${event.label} ==`);
        if (this.cavern) {
          this.write(renderAscii(this.cavern, { charset: this.charset, position: this.position }));
        }
        break;
      case "error":
        this.write(`!! ${event.message}`);
        break;
      case "steps":
      case "bonus":
      case "gold":
        break;
    }
  }
}
