import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { DocumentQueryRunner } from "../api/runEndpoint.js";
import { documentQueryRequestShape } from "../api/schemas.js";
import { RetrievalError } from "../domain/errors.js";

export function registerAnswerDocumentQuestionsTool(
  server: McpServer,
  service: DocumentQueryRunner,
) {
  server.registerTool(
    "answer_document_questions",
    {
      title: "Answer Document Questions",
      description:
        "Downloads a PDF or DOCX document, indexes it, and answers each question with supporting clauses.",
      inputSchema: documentQueryRequestShape,
    },
    async ({ documents, questions }) => {
      try {
        const result = await service.answerQuestions({ documents, questions });
        return {
          content: [
            {
              type: "text",
              text: JSON.stringify(result, null, 2),
            },
          ],
        };
      } catch (error) {
        if (!(error instanceof RetrievalError)) {
          throw error;
        }
        return {
          isError: true,
          content: [
            {
              type: "text",
              text: JSON.stringify({ error: { kind: error.kind, message: error.message } }, null, 2),
            },
          ],
        };
      }
    },
  );
}
