/**
 * RecordCodec 단위 테스트
 */

import { describe, it, expect, beforeEach } from "@jest/globals";
import { RecordCodec } from "@/extractors/RecordCodec";
import {
  createCapturingLogger,
  type CapturingLogger,
} from "../helpers/testLogger";

describe("RecordCodec", () => {
  let capture: CapturingLogger;
  let codec: RecordCodec;

  beforeEach(() => {
    capture = createCapturingLogger();
    codec = new RecordCodec(capture.logger);
  });

  describe("기본 매핑", () => {
    it("상호명만 있는 행은 나머지를 N/A 로 채움", () => {
      expect(codec.decode(["Acme LLC"])).toStrictEqual({
        business_name: "Acme LLC",
        registration_id: "N/A",
        status: "N/A",
        filing_date: "N/A",
        agent_details: "N/A",
      });
    });

    it("4컬럼 행은 agent_details 만 N/A", () => {
      expect(
        codec.decode(["Acme LLC", "ID1", "Active", "2024-01-01"]),
      ).toStrictEqual({
        business_name: "Acme LLC",
        registration_id: "ID1",
        status: "Active",
        filing_date: "2024-01-01",
        agent_details: "N/A",
      });
    });

    it("빈 셀은 N/A 가 아닌 빈 문자열 유지", () => {
      const record = codec.decode(["Acme LLC", "", "Active"]);

      expect(record?.registration_id).toBe("");
      expect(record?.status).toBe("Active");
      expect(record?.filing_date).toBe("N/A");
    });

    it("셀 앞뒤 공백 제거", () => {
      const record = codec.decode(["  Acme LLC ", "\tID1\n"]);

      expect(record?.business_name).toBe("Acme LLC");
      expect(record?.registration_id).toBe("ID1");
    });
  });

  describe("대리인 컬럼", () => {
    it("7컬럼 행은 agent_name / agent_address / agent_email 추가", () => {
      expect(
        codec.decode([
          "Acme LLC",
          "ID1",
          "Active",
          "2024-01-01",
          "John",
          "123 St",
          "j@x.com",
        ]),
      ).toStrictEqual({
        business_name: "Acme LLC",
        registration_id: "ID1",
        status: "Active",
        filing_date: "2024-01-01",
        agent_details: "John | 123 St | j@x.com",
        agent_name: "John",
        agent_address: "123 St",
        agent_email: "j@x.com",
      });
    });

    it("5~6컬럼 행은 agent_details 만 결합", () => {
      const five = codec.decode(["Acme LLC", "ID1", "Active", "2024-01-01", "John"]);
      const six = codec.decode([
        "Acme LLC",
        "ID1",
        "Active",
        "2024-01-01",
        "John",
        "123 St",
      ]);

      expect(five?.agent_details).toBe("John");
      expect(six?.agent_details).toBe("John | 123 St");
      expect(six).not.toHaveProperty("agent_name");
      expect(six).not.toHaveProperty("agent_email");
    });

    it("8컬럼 이상이면 4번 이후 전부 agent_details 에 결합", () => {
      const record = codec.decode([
        "Acme LLC",
        "ID1",
        "Active",
        "2024-01-01",
        "John",
        "123 St",
        "j@x.com",
        "555-0100",
      ]);

      expect(record?.agent_details).toBe("John | 123 St | j@x.com | 555-0100");
      expect(record?.agent_name).toBe("John");
      expect(record?.agent_email).toBe("j@x.com");
    });
  });

  describe("파싱 불가 행", () => {
    it("셀이 없으면 null", () => {
      expect(codec.decode([])).toBeNull();
    });

    it("상호명이 비어 있으면 null + 경고", () => {
      expect(codec.decode(["   ", "ID1"], { page: 2, rowIndex: 5 })).toBeNull();

      const warnings = capture.warnings();
      expect(warnings).toHaveLength(1);
      expect(warnings[0].page).toBe(2);
      expect(warnings[0].rowIndex).toBe(5);
    });

    it("셀 읽기 중 에러는 null + 에러 로그 (throw 하지 않음)", () => {
      const cells: string[] = ["Acme LLC", "ID1"];
      Object.defineProperty(cells, 1, {
        get() {
          throw new Error("detached node");
        },
      });

      expect(codec.decode(cells, { page: 3, rowIndex: 0 })).toBeNull();

      const errors = capture.errors();
      expect(errors).toHaveLength(1);
      expect(errors[0].errorType).toBe("MALFORMED_ROW");
      expect(errors[0].page).toBe(3);
      expect(errors[0].message).toBe("행 파싱 실패: detached node");
    });
  });
});
