// 정규화 경계에서 걸러지는 슬롯 계약 위반 (수량 0 이하 등)
export class SlotValidationError extends Error {
  readonly fields: Record<string, string>;

  constructor(fields: Record<string, string>) {
    const summary = Object.entries(fields)
      .map(([key, msg]) => `${key}: ${msg}`)
      .join(', ');
    super(`슬롯 검증 실패 - ${summary}`);
    this.name = 'SlotValidationError';
    this.fields = fields;
  }
}

// 인쇄소 디렉터리 자체가 비어 있음 (조건 불일치와 구분되는 협력 시스템 장애)
export class VendorPoolUnavailableError extends Error {
  constructor(reason: string) {
    super(`인쇄소 데이터를 사용할 수 없습니다: ${reason}`);
    this.name = 'VendorPoolUnavailableError';
  }
}

export class SessionNotFoundError extends Error {
  constructor(readonly sessionId: string) {
    super(`대화 세션을 찾을 수 없습니다: ${sessionId}`);
    this.name = 'SessionNotFoundError';
  }
}
