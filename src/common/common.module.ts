import { Module } from "@nestjs/common";
import { VerificationModule } from "../verification/verification.module";
import { HealthController } from "./controllers/health.controller";

@Module({
  imports: [VerificationModule],
  controllers: [HealthController],
})
export class CommonModule {}
