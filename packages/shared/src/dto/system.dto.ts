// System DTOs (packages/shared/src/dto/system.dto.ts)
// Endpoints: GET /api/nextgen/, GET /api/nextgen/capabilities, POST /api/nextgen/heartbeat

export interface IndexResponseDto {
  message: string;
}

export interface CapabilitiesResponseDto {
  models: string[];
}

export interface HeartbeatResponseDto {
  info: string;
  role: string;
}
