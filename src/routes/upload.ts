import { Router } from 'express';
import multer from 'multer';
import path from 'node:path';
import fs from 'node:fs';
import { v4 as uuidv4 } from 'uuid';

import type { DocumentStore } from '../store/documents';

type UploadRouterDeps = {
  documents: DocumentStore;
  uploadDir: string;
};

export const createUploadRouter = ({ documents, uploadDir }: UploadRouterDeps): Router => {
  const router = Router();
  const filesDir = path.resolve(uploadDir);
  fs.mkdirSync(filesDir, { recursive: true });

  const storage = multer.diskStorage({
    destination: (_req, _file, cb) => {
      cb(null, filesDir);
    },
    filename: (_req, file, cb) => {
      const safeName = file.originalname.replace(/[^a-zA-Z0-9._-]+/g, '_');
      cb(null, `${Date.now()}-${safeName}`);
    },
  });

  const upload = multer({ storage });

  router.post('/', upload.single('resume'), (req, res) => {
    const resumeFile = req.file;

    if (!resumeFile) {
      return res.status(400).json({ error: 'A resume file is required in the "resume" field.' });
    }

    const id = `doc_${uuidv4()}`;

    documents.save({ id, name: resumeFile.originalname, path: path.resolve(resumeFile.path) });

    return res.status(201).json({ id, name: resumeFile.originalname });
  });

  return router;
};
