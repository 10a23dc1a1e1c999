/**
 * 로거 설정
 * Pino 기반 로깅 시스템
 *
 * 기능:
 * - 다중 출력 (콘솔 + 파일)
 * - 서비스별 로그 파일 분리 (SERVICE_NAME 환경변수 기반)
 * - 일일 로그 로테이션
 * - 구조화된 JSON 로깅
 *
 * 콘솔 출력:
 * - 개발 환경 + LOG_PRETTY=true: 색상 포맷
 * - 그 외: JSON 포맷
 *
 * 파일 출력 (날짜별 디렉터리):
 * - logs/YYYY-MM-DD/crawler.log
 * - logs/YYYY-MM-DD/error.log (에러 통합)
 *
 * 테스트 환경(NODE_ENV=test)에서는 파일 출력을 끄고 기본 레벨을 silent로 둔다.
 */

import pino from "pino";
import type { DestinationStream } from "pino";
import { createStream } from "rotating-file-stream";
import type { RotatingFileStream } from "rotating-file-stream";
import path from "path";
import fs from "fs";
import { z } from "zod";
import { APP_METADATA, SERVICE_NAMES } from "@/config/constants";
import { getDateDirName, getTimestampWithTimezone } from "@/utils/timestamp";

// 환경 변수
const NODE_ENV = process.env.NODE_ENV || "development";
const IS_TEST = NODE_ENV === "test";
const LOG_LEVEL =
  process.env.LOG_LEVEL ||
  (IS_TEST ? "silent" : NODE_ENV === "production" ? "info" : "debug");
const LOG_DIR = process.env.LOG_DIR || path.join(process.cwd(), "logs");
const LOG_PRETTY = process.env.LOG_PRETTY === "true";
const LOG_TO_FILE = process.env.LOG_TO_FILE
  ? process.env.LOG_TO_FILE === "true"
  : !IS_TEST;
const SERVICE_NAME = process.env.SERVICE_NAME || SERVICE_NAMES.CRAWLER;

/**
 * 날짜별 디렉터리에 로그 파일 생성
 * 구조: LOG_DIR/YYYY-MM-DD/{prefix}.log
 */
function createRotatingStream(prefix: string): RotatingFileStream {
  return createStream(
    () => {
      const dateDir = getDateDirName();
      const fullDir = path.join(LOG_DIR, dateDir);

      if (!fs.existsSync(fullDir)) {
        fs.mkdirSync(fullDir, { recursive: true });
      }

      return path.join(dateDir, `${prefix}.log`);
    },
    {
      interval: "1d", // 일일 로테이션
      intervalBoundary: true, // 자정 기준 정렬
      initialRotation: true,
      immutable: true,
      path: LOG_DIR,
      maxFiles: 30,
      maxSize: "100M",
    },
  );
}

/**
 * 파일 라우팅에 필요한 로그 라인 필드
 */
const LogLineSchema = z.object({
  level: z.string().optional(),
  service_name: z.string().optional(),
  skip_file_log: z.boolean().optional(),
});

/**
 * 서비스별 라우팅 스트림
 * skip_file_log 플래그가 있는 로그는 파일에 저장하지 않음
 */
class ServiceRoutingStream implements DestinationStream {
  private readonly streams = new Map<string, RotatingFileStream>();
  private readonly errorStream = createRotatingStream("error");

  write(chunk: string): void {
    let serviceName = SERVICE_NAME;

    let parsed: unknown;
    try {
      parsed = JSON.parse(chunk);
    } catch {
      // JSON이 아닌 청크는 기본 서비스 파일에 그대로 기록
      parsed = null;
    }

    const line = LogLineSchema.safeParse(parsed);
    if (line.success) {
      if (line.data.skip_file_log === true) {
        return;
      }
      if (line.data.service_name) {
        serviceName = line.data.service_name;
      }
      if (line.data.level === "error" || line.data.level === "fatal") {
        this.errorStream.write(chunk);
      }
    }

    this.getOrCreateStream(serviceName).write(chunk);
  }

  private getOrCreateStream(serviceName: string): RotatingFileStream {
    const existing = this.streams.get(serviceName);
    if (existing) {
      return existing;
    }

    const stream = createRotatingStream(serviceName);
    this.streams.set(serviceName, stream);
    return stream;
  }
}

/**
 * 파일 출력이 꺼진 경우의 destination
 */
class NullStream implements DestinationStream {
  write(): void {}
}

/**
 * Pino 로그 레벨 상수
 */
const LOG_LEVELS = {
  WARN: 40,
  ERROR: 50,
} as const;

/**
 * 콘솔 출력 포맷터 타입
 */
type ConsoleFormatter = (logObj: Record<string, unknown>, level: number) => void;

/**
 * 개발 환경용 콘솔 포맷터 (색상 + 구조화)
 */
const formatConsolePretty: ConsoleFormatter = (logObj, level) => {
  const msg = typeof logObj.msg === "string" ? logObj.msg : "";
  const star = logObj.important ? " ⭐" : "";
  const time = new Date().toLocaleTimeString("en-US", { hour12: false });
  const levelColor =
    level >= LOG_LEVELS.ERROR
      ? "\x1b[31m"
      : level >= LOG_LEVELS.WARN
        ? "\x1b[33m"
        : "\x1b[32m";
  const levelText =
    level >= LOG_LEVELS.ERROR
      ? "ERROR"
      : level >= LOG_LEVELS.WARN
        ? "WARN"
        : "INFO";

  console.error(
    `[${time}] ${levelColor}${levelText}\x1b[0m${star} \x1b[36m${msg}\x1b[0m`,
  );

  const excludedFields = ["msg", "important", "skip_file_log"];
  for (const [field, value] of Object.entries(logObj)) {
    if (excludedFields.includes(field)) continue;
    const rendered =
      typeof value === "object" ? JSON.stringify(value) : String(value);
    console.error(`  ${field}: ${rendered}`);
  }
};

/**
 * 프로덕션 환경용 콘솔 포맷터 (JSON)
 */
const formatConsoleJson: ConsoleFormatter = (logObj, level) => {
  console.log(JSON.stringify({ ...logObj, level }));
};

/**
 * 콘솔 출력 Hook 생성 함수
 * Pino 형식: logger.info(obj, msg) 또는 logger.info(msg)
 */
function createConsoleHook(
  formatter: ConsoleFormatter,
): pino.LoggerOptions["hooks"] {
  return {
    logMethod(inputArgs, method, level) {
      method.apply(this, inputArgs);

      const [first, second] = inputArgs;
      const logObj: Record<string, unknown> = {};

      if (typeof first === "string") {
        logObj.msg = first;
      } else if (typeof first === "object" && first !== null) {
        Object.assign(logObj, first);
        if (typeof second === "string") {
          logObj.msg = second;
        }
      }

      formatter(logObj, level);
    },
  };
}

const baseConfig: pino.LoggerOptions = {
  level: LOG_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: () => `,"time":"${getTimestampWithTimezone()}"`,
  base: {
    service: "catalog_crawler",
    version: APP_METADATA.VERSION,
    env: NODE_ENV,
    service_name: SERVICE_NAME,
  },
  hooks: createConsoleHook(
    NODE_ENV === "development" && LOG_PRETTY
      ? formatConsolePretty
      : formatConsoleJson,
  ),
};

/**
 * 메인 로거 인스턴스
 */
const logger: pino.Logger = pino(
  baseConfig,
  LOG_TO_FILE ? new ServiceRoutingStream() : new NullStream(),
);

export { logger };

export type Logger = pino.Logger;
