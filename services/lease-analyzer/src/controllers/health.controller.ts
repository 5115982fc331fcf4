import { Controller, Get } from "@nestjs/common";

@Controller()
export class HealthController {
  @Get()
  root(): { message: string } {
    return { message: "Lease document analysis API" };
  }

  @Get("health")
  health(): { status: "ok" } {
    return { status: "ok" };
  }
}
