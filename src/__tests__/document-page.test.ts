import { describe, expect, it } from "vitest";
import { extractDocumentPage, toIsoDate } from "../acquisition/document-page";

const ARTICLE = [
  "<html><head><title>ignored</title>",
  "<meta name=\"ArticleTitle\" content=\"固定资产投资项目节能审查办法\">",
  "<meta name=\"ContentSource\" content=\"国家发展和改革委员会\">",
  "<meta name=\"PubDate\" content=\"2023-04-06 10:00\">",
  "<meta name=\"keywords\" content=\"节能，审查; 投资\">",
  "<script>var tracking = 1;</script>",
  "</head><body><div id=\"UCAP-CONTENT\"><p>国家发展改革委令第2号</p><p>本办法自2023年6月1日起施行。</p></div></body></html>",
].join("");

describe("toIsoDate", () => {
  it("reads Chinese and ISO dates, Chinese first", () => {
    expect(toIsoDate("2023年6月1日")).toBe("2023-06-01");
    expect(toIsoDate("发布于 2021-6-10")).toBe("2021-06-10");
    expect(toIsoDate("2021-06-10 起草，2020年1月2日 发布")).toBe("2020-01-02");
    expect(toIsoDate("无日期")).toBeNull();
    expect(toIsoDate(null)).toBeNull();
  });
});

describe("extractDocumentPage", () => {
  it("picks fields from meta tags and the article body", () => {
    const record = extractDocumentPage({
      html: ARTICLE,
      url: "https://www.gov.cn/a.htm",
      source: "direct_url",
      fallbackTitle: "fallback",
    });

    expect(record).toEqual({
      title: "固定资产投资项目节能审查办法",
      url: "https://www.gov.cn/a.htm",
      source: "direct_url",
      documentNumber: "第2号",
      issuingOffice: "国家发展和改革委员会",
      publishedAt: "2023-04-06",
      effectiveAt: "2023-06-01",
      status: null,
      content: "国家发展改革委令第2号本办法自2023年6月1日起施行。",
      keywords: ["节能", "审查", "投资"],
    });
  });

  it("reads bracketed document numbers", () => {
    const record = extractDocumentPage({
      html: "<html><body><h1>关于加强节能审查的通知</h1><div class=\"content\">国办发〔2023〕5号 各省人民政府</div></body></html>",
      url: "https://www.gov.cn/b.htm",
      source: "search_engine",
      fallbackTitle: "fallback",
    });

    expect(record.title).toBe("关于加强节能审查的通知");
    expect(record.documentNumber).toBe("国办发〔2023〕5号");
    expect(record.content).toBe("国办发〔2023〕5号 各省人民政府");
  });

  it("falls back to the candidate title and the page body", () => {
    const record = extractDocumentPage({
      html: "<html><body><p>正文 内容</p></body></html>",
      url: "https://www.gov.cn/c.htm",
      source: "search_engine",
      fallbackTitle: "候选标题",
    });

    expect(record).toMatchObject({
      title: "候选标题",
      documentNumber: null,
      issuingOffice: null,
      publishedAt: null,
      effectiveAt: null,
      content: "正文 内容",
      keywords: [],
    });
  });
});
