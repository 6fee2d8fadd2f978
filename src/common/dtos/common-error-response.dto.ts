export interface CommonErrorResponseDto {
  /**
   * 메시지 (유효성 검사 실패 시 항목별 메시지 배열)
   */
  message: string | string[];

  /**
   * 에러 이름 (예: Not Found)
   */
  error: string;

  /**
   * 상태코드
   */
  statusCode: number;
}
