import { Module } from "@nestjs/common";
import { CommonModule } from "./common/common.module";
import { VerificationModule } from "./verification/verification.module";

@Module({
  imports: [VerificationModule, CommonModule],
})
export class AppModule {}
